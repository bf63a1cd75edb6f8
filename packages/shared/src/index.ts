export {
  createLogger,
  createRuntimeLogger,
  getLogger,
  setDefaultLogger,
  type Logger,
  type LoggerConfig,
  type RuntimeLogger,
} from "./logger";
export {
  Reference,
  createReference,
  type ReadOnlyReference,
  type ReferenceListener,
} from "./reference";
export { resolveFirst, resolveFirstOr, type Candidate } from "./resolve";
