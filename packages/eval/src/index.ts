export const name = '@repairbench/eval';

export { classify, assessLocalization } from './verdict';
export type { Localization } from './verdict';
export { Aggregator, computeStats } from './aggregator';
export type { AggregatorOptions, RecordedRun, ScheduledRun } from './aggregator';
export { mean, percentile, rate, summarizeLatencies } from './stats';
export { ProgressRenderer, outcomeBadge } from './renderer';
export { writeReport } from './report';
export * from './criteria';
