export { logger, setLoggerOptions, type Logger } from './logger.js';
export {
  PrimerError,
  ConfigNotFoundError,
  ValidationError,
  AdaptationError,
  PatternNotDetectedError,
  ExtractionError,
  InsufficientExamplesError,
  TrainingTimeoutError,
  TrainingError,
  MemoryLimitExceededError,
  LowConfidenceError,
  AdaptationCancelledError,
  GenerationFailureError,
} from './errors.js';
