/**
 * conduit - Exceptions Module
 */

export type {
  IExceptionFilter,
  ExceptionFilterFunction,
  ExceptionContext,
  ExtractionIssue,
  DefaultExceptionFilterOptions,
} from './exceptions';

export {
  createExceptionFilter,
  toError,
  errorLabel,
  // Built-in exceptions
  HttpException,
  BadRequestException,
  ExtractionException,
  NotFoundException,
  MethodNotAllowedException,
  NotAcceptableException,
  ConflictException,
  UnsupportedMediaTypeException,
  ValidationException,
  TooManyRequestsException,
  RequestCancelledException,
  ServiceUnavailableException,
  // Built-in filters
  DefaultExceptionFilter,
  HttpExceptionFilter,
  ValidationExceptionFilter,
  ExceptionFilterChain,
} from './exceptions';

export {
  ConduitError,
  StateAbsentError,
  ForeignHandleError,
  BuilderConsumedError,
  FrozenStructureError,
  RouteConfigurationError,
} from './errors';
