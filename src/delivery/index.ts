export {
  BatchDeliverer,
  type AttemptOutcome,
  type BatchDelivererOptions,
  type BatchOutcome,
  type DeliveryAttempt,
} from './batch-delivery.js';
export { systemClock, type Clock } from './clock.js';
export {
  computeBackoff,
  initialState,
  isTerminal,
  transition,
  type DeliveryEvent,
  type DeliveryState,
  type DeliveryStatus,
  type TransitionContext,
} from './state-machine.js';
