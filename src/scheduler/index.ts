export type { SchedulerTiming, SchedulerPhase, SchedulerOutcome, Display } from './types';
export { DEFAULT_TIMING } from './types';
export type { Clock } from './clock';
export { SystemClock, VirtualClock } from './clock';
export { PlaybackScheduler, EMPTY_SCHEDULE_NOTICE } from './engine';
