export {classifyFailure, type ClassifiedOutcome} from './classify';
export {RequestValidationError, requestValidationError} from './errors';
export {
  defaultOutcomeMessages,
  outcomeHttpStatus,
  OutcomeKindSchema,
  outcomeKinds,
  type OutcomeHttpStatus,
  type OutcomeKind
} from './kinds';
export {
  failed,
  failWith,
  succeeded,
  type OperationFailure,
  type OperationResult,
  type OperationSuccess
} from './result';
