import {
  DataCollector,
  KeypressResponseSource,
  Staircase,
  TrialSequence,
  runStaircase,
  saveJSON,
  type StaircaseRow,
} from '../index';

// Five conditions, each repeated twice
const sequence = TrialSequence.range(5, { nReps: 2, name: 'demo' });
console.log(`${sequence}`, sequence.trials);

// Step size shrinks every two reversals
const staircase = new Staircase({
  start: 50,
  step: [8, 4, 4, 2, 2, 1],
  stepType: 'lin',
  reversal: 10,
  trials: 15,
  up: 1,
  down: 1,
  min: 0,
  max: 60,
});
const dc = new DataCollector<StaircaseRow>(`staircase-${Date.now()}.csv`);
const keys = new KeypressResponseSource();
dc.on('add', ({ row }) =>
  console.log(`trial # ${row.trial}: intensity ${row.intensity}`),
);

console.log('Did you hear the tone? (y/n)');
try {
  const threshold = await runStaircase(staircase, keys, dc);
  console.log(`reversals: ${staircase.reversalIntensities.join(', ')}`);
  console.log(`mean of final 6 reversals: ${threshold}`);
} finally {
  keys.close();
}
await dc.save();
await saveJSON(`staircase-${Date.now()}.json`, staircase);
