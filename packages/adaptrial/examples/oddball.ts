import { TrialSequence, seed } from '../index';

seed(2024);
const sequence = TrialSequence.mmnSequence(60);
console.log(sequence.trials.join(''));
console.log('condition probabilities', sequence.conditionProbabilities());
console.log('transitions', sequence.transitions());
