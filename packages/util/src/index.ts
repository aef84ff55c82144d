export { deepMerge, isPlainObject } from './deepMerge';
export type { PlainObject } from './deepMerge';
export { sleep, toErrorMessage } from './sleep';
export type { SleepFn } from './sleep';
