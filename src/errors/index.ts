export {
  UserError,
  SchemaDocumentError,
  EXIT_USER_ERROR,
  EXIT_APPLICATION_ERROR,
  getExitCode,
  errorMessage,
} from './ComponentErrors.js';
