import { ZodError } from 'zod';
import { ExternalFetchError } from '../util/fetch.js';

export interface StandardError {
  code: string;
  message: string;
  details?: unknown;
  causeId?: string;
}

export type CoreNlpErrorCode =
  | 'unresolved_language'
  | 'unknown_model_family'
  | 'model_unavailable'
  | 'model_not_found'
  | 'invalid_configuration'
  | 'pipeline_construction_failed'
  | 'annotation_failed'
  | 'bootstrap_failed';

export class CoreNlpError extends Error {
  code: CoreNlpErrorCode;
  constructor(code: CoreNlpErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnresolvedLanguageError extends CoreNlpError {
  token: string;
  constructor(token: string) {
    super('unresolved_language', `Unsupported language "${token}"`);
    this.token = token;
  }
}

export class UnknownModelFamilyError extends CoreNlpError {
  family: string;
  constructor(family: string) {
    super('unknown_model_family', `No model family named "${family}"`);
    this.family = family;
  }
}

export class ModelUnavailableError extends CoreNlpError {
  family: string;
  language: string;
  constructor(family: string, language: string) {
    super('model_unavailable', `Annotator "${family}" has no model for ${language}`);
    this.family = family;
    this.language = language;
  }
}

export class ModelNotFoundError extends CoreNlpError {
  path: string;
  constructor(path: string) {
    super(
      'model_not_found',
      `Model file ${path} could not be found. ` +
        'You may need to download this file manually and/or set paths properly.',
    );
    this.path = path;
  }
}

export class ConfigurationError extends CoreNlpError {
  constructor(message: string) {
    super('invalid_configuration', message);
  }
}

export class PipelineConstructionError extends CoreNlpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('pipeline_construction_failed', message, options);
  }
}

export class AnnotationError extends CoreNlpError {
  status?: number;
  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super('annotation_failed', message, options);
    this.status = status;
  }
}

export class BootstrapError extends CoreNlpError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('bootstrap_failed', message, options);
  }
}

function detailsOf(error: CoreNlpError): Record<string, unknown> | undefined {
  if (error instanceof ModelNotFoundError) return { path: error.path };
  if (error instanceof UnresolvedLanguageError) return { token: error.token };
  if (error instanceof ModelUnavailableError) {
    return { family: error.family, language: error.language };
  }
  if (error instanceof UnknownModelFamilyError) return { family: error.family };
  if (error instanceof AnnotationError && error.status !== undefined) {
    return { status: error.status };
  }
  return undefined;
}

/**
 * Maps any thrown value to the standard error shape printed by the CLI.
 */
export function toStdError(error: unknown, ctx?: string): StandardError {
  if (error instanceof CoreNlpError) {
    const details = detailsOf(error);
    return {
      code: error.code,
      message: error.message,
      ...(details ? { details } : {}),
      causeId: ctx,
    };
  }

  if (error instanceof ZodError) {
    return {
      code: 'invalid_configuration',
      message: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      causeId: ctx,
    };
  }

  if (error instanceof ExternalFetchError) {
    return {
      code: error.kind === 'timeout' ? 'timeout' : 'network_error',
      message: error.message,
      causeId: ctx,
    };
  }

  if (error instanceof Error) {

    return {
      code: 'internal_error',
      message: error.message,
      causeId: ctx,
    };
  }

  return {
    code: 'unknown_error',
    message: 'Unknown error occurred',
    details: error,
    causeId: ctx,
  };
}
