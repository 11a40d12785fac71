export type { FieldError } from "./errors";
export {
  VulnrankError,
  InvalidInputError,
  ConfigValidationError,
  IngestionError,
  UnsupportedFormatError,
  RecordNotFoundError,
  errorMessage,
} from "./errors";
