export { SessionController } from './controller';
export type { SessionOptions, SessionOutcome, SessionResult, SignalName, SignalSource } from './controller';
export { ProcessSlot } from './process-slot';
export { toRepeatCount, decrementRepeat, hasRepeatsLeft, describeRepeat } from './repeat';
export type { RepeatCount } from './repeat';
