export { QualificationEngine, type QualificationEngineOptions } from "./qualification-engine.js";
export { type Transition, type TransitionInput, isExpired, nextTransition, profitTarget } from "./transitions.js";
export { type Evaluation, EvaluationStatus, FailureReason, type VirtualCloseOutcome } from "./types.js";
