export type Primitive = string | number | boolean | null | undefined;
/** One row of collected data, primitive values only */
export type Data = { [key: string]: Primitive };

export type Direction = 'up' | 'down';
export type StepType = 'db' | 'log' | 'lin';
export type ThresholdMethod = 'geometric' | 'arithmetic';
