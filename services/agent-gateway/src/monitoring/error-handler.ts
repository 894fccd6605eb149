import { ErrorRequestHandler, Request, Response, NextFunction } from 'express';
import { isGatewayError } from '../errors/index.js';
import { isRecord } from '../utils/objects.js';

export type ErrorSeverity = 'low' | 'medium' | 'high' | 'critical';

export interface ErrorInfo {
  id: string;
  timestamp: string;
  type: string;
  code: string;
  statusCode: number;
  message: string;
  stack?: string;
  context: {
    url?: string;
    method?: string;
    userAgent?: string;
    ip?: string;
    account?: string;
    instance?: string;
  };
  severity: ErrorSeverity;
}

export interface ErrorStats {
  total: number;
  bySeverity: Record<string, number>;
  byType: Record<string, number>;
}

export interface ErrorHandlerOptions {
  /** Include stack and request context in responses. */
  exposeDetails?: boolean;
  /** Oldest entries are dropped past this many. */
  maxStoredErrors?: number;
}

const GENERIC_MESSAGE = 'An unexpected error occurred. Please try again.';

/**
 * Client errors raised by Express itself (body-parser) carry `status` and
 * `expose: true`.
 */
function exposedHttpStatus(error: unknown): number | null {
  if (!isRecord(error)) return null;
  const status = error['status'];
  const expose = error['expose'];
  return typeof status === 'number' && status >= 400 && status < 500 && expose === true ? status : null;
}

export class ErrorHandler {
  private readonly errors: Map<string, ErrorInfo> = new Map();
  private readonly exposeDetails: boolean;
  private readonly maxStoredErrors: number;

  constructor(options: ErrorHandlerOptions = {}) {
    this.exposeDetails = options.exposeDetails ?? process.env['NODE_ENV'] === 'development';
    this.maxStoredErrors = options.maxStoredErrors ?? 1000;
  }

  /**
   * Express error handling middleware
   */
  middleware(): ErrorRequestHandler {
    return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
      if (res.headersSent) {
        next(error);
        return;
      }

      const errorInfo = this.captureError(error, {
        url: req.originalUrl,
        method: req.method,
        userAgent: req.get('User-Agent'),
        ip: req.ip,
        account: req.params['account'],
        instance: req.params['instance'],
      });
      this.sendErrorResponse(errorInfo, res);
    };
  }

  /**
   * Capture and categorize an error
   */
  captureError(error: unknown, context: ErrorInfo['context'] = {}): ErrorInfo {
    const errorInfo: ErrorInfo = {
      id: this.generateErrorId(),
      timestamp: new Date().toISOString(),
      context,
      ...this.classify(error),
    };

    this.errors.set(errorInfo.id, errorInfo);
    this.trimStoredErrors();
    this.logError(errorInfo);
    return errorInfo;
  }

  /**
   * Message a client may see. Server-side failures are replaced by a generic
   * message unless details are exposed.
   */
  publicMessage(statusCode: number, message: string): string {
    return statusCode >= 500 && !this.exposeDetails ? GENERIC_MESSAGE : message;
  }

  toResponseBody(errorInfo: ErrorInfo): Record<string, unknown> {
    return {
      success: false,
      error: errorInfo.type,
      code: errorInfo.code,
      message: this.publicMessage(errorInfo.statusCode, errorInfo.message),
      errorId: errorInfo.id,
      timestamp: errorInfo.timestamp,
      ...(this.exposeDetails && {
        stack: errorInfo.stack,
        context: errorInfo.context,
      }),
    };
  }

  getErrorStats(): ErrorStats {
    const stats: ErrorStats = {
      total: this.errors.size,
      bySeverity: {},
      byType: {},
    };

    for (const error of this.errors.values()) {
      stats.bySeverity[error.severity] = (stats.bySeverity[error.severity] ?? 0) + 1;
      stats.byType[error.type] = (stats.byType[error.type] ?? 0) + 1;
    }
    return stats;
  }

  private sendErrorResponse(errorInfo: ErrorInfo, res: Response): void {
    res.status(errorInfo.statusCode).json(this.toResponseBody(errorInfo));
  }

  private classify(error: unknown): Pick<ErrorInfo, 'type' | 'code' | 'statusCode' | 'message' | 'stack' | 'severity'> {
    if (isGatewayError(error)) {
      return {
        type: error.name,
        code: error.code,
        statusCode: error.statusCode,
        message: error.message,
        stack: error.stack,
        severity: this.determineSeverity(error.statusCode, error.message),
      };
    }

    const message = error instanceof Error ? error.message : String(error);
    const stack = error instanceof Error ? error.stack : undefined;
    const exposedStatus = exposedHttpStatus(error);
    if (exposedStatus !== null) {
      return { type: 'BadRequestError', code: 'BAD_REQUEST', statusCode: exposedStatus, message, stack, severity: 'low' };
    }

    return {
      type: error instanceof Error ? error.constructor.name : 'UnknownError',
      code: 'INTERNAL_ERROR',
      statusCode: 500,
      message,
      stack,
      severity: this.determineSeverity(500, message),
    };
  }

  private determineSeverity(statusCode: number, message: string): ErrorSeverity {
    const lower = message.toLowerCase();
    if (lower.includes('database') || lower.includes('connection')) {
      return 'critical';
    }
    if (statusCode >= 500) {
      return 'high';
    }
    if (statusCode === 400) {
      return 'low';
    }
    return 'medium';
  }

  private logError(errorInfo: ErrorInfo): void {
    const logLevel = errorInfo.severity === 'critical' || errorInfo.severity === 'high' ? 'error' : 'warn';
    console[logLevel](`[error-handler] Error ${errorInfo.id}: ${errorInfo.type} - ${errorInfo.message}`, {
      code: errorInfo.code,
      severity: errorInfo.severity,
      context: errorInfo.context,
    });
  }

  private trimStoredErrors(): void {
    while (this.errors.size > this.maxStoredErrors) {
      const oldest = this.errors.keys().next();
      if (oldest.done) return;
      this.errors.delete(oldest.value);
    }
  }

  private generateErrorId(): string {
    return `err_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }
}
