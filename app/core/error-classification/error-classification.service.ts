import { injectable } from 'inversify';
import { ClientInputError, UpstreamError } from '../errors';

export type ErrorCategory = 'client_input' | 'not_found' | 'upstream' | 'internal';

export interface ErrorResponseBody {
  error: {
    message: string;
    type: string;
    code: string | null;
  };
}

export interface ErrorClassificationResult {
  readonly status: number;
  readonly category: ErrorCategory;
  readonly body: ErrorResponseBody;
}

/**
 * Framework error codes raised before a handler runs, as reported by Elysia.
 */
const FRAMEWORK_CLIENT_ERRORS: Readonly<Record<string, number>> = {
  PARSE: 400,
  VALIDATION: 400,
  NOT_FOUND: 404
};

const STATUS_MESSAGES: Readonly<Record<number, string>> = {
  400: 'Bad Request',
  404: 'Not Found',
  405: 'Method Not Allowed',
  500: 'Internal Server Error'
};

@injectable()
export class ErrorClassificationService {
  classify(error: unknown, frameworkCode?: string): ErrorClassificationResult {
    if (error instanceof ClientInputError) {
      return this.result(error.statusCode, 'client_input', 'invalid_request_error');
    }

    if (error instanceof UpstreamError) {
      return this.result(500, 'upstream', 'upstream_error');
    }

    const frameworkStatus = frameworkCode ? FRAMEWORK_CLIENT_ERRORS[frameworkCode] : undefined;
    if (frameworkStatus === 404) {
      return this.result(404, 'not_found', 'not_found_error');
    }
    if (frameworkStatus !== undefined) {
      return this.result(frameworkStatus, 'client_input', 'invalid_request_error');
    }

    return this.result(500, 'internal', 'internal_server_error');
  }

  private result(status: number, category: ErrorCategory, type: string): ErrorClassificationResult {
    return {
      status,
      category,
      body: {
        error: {
          message: STATUS_MESSAGES[status] ?? 'Error',
          type,
          code: null
        }
      }
    };
  }
}
