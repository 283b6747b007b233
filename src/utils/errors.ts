/**
 * Error taxonomy for the Data Browser client
 */

export enum ErrorCode {
  INVALID_PARAMETER = 'INVALID_PARAMETER',
  TRANSPORT_ERROR = 'TRANSPORT_ERROR',
  HTTP_ERROR = 'HTTP_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

export class HmdaError extends Error {
  public readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HmdaError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message
    };
  }
}

export class InvalidParameterError extends HmdaError {
  public readonly parameter: string;
  public readonly value: unknown;

  constructor(parameter: string, value: unknown, message: string) {
    super(ErrorCode.INVALID_PARAMETER, message);
    this.name = 'InvalidParameterError';
    this.parameter = parameter;
    this.value = value;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), parameter: this.parameter, value: this.value };
  }
}

export class TransportError extends HmdaError {
  public readonly url: string;

  constructor(url: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(ErrorCode.TRANSPORT_ERROR, `Request to ${url} failed: ${reason}`, { cause });
    this.name = 'TransportError';
    this.url = url;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), url: this.url };
  }
}

export class HttpError extends HmdaError {
  public readonly status: number;
  public readonly statusText: string;
  public readonly body: string;
  public readonly url: string;

  constructor(url: string, status: number, statusText: string, body: string) {
    super(ErrorCode.HTTP_ERROR, `API error: ${status} ${statusText}`.trim());
    this.name = 'HttpError';
    this.url = url;
    this.status = status;
    this.statusText = statusText;
    this.body = body;
  }

  toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      url: this.url,
      status: this.status,
      statusText: this.statusText,
      body: this.body
    };
  }
}

const EXCERPT_LENGTH = 200;

export class ParseError extends HmdaError {
  public readonly excerpt: string;

  constructor(message: string, body: string, cause?: unknown) {
    super(ErrorCode.PARSE_ERROR, message, { cause });
    this.name = 'ParseError';
    this.excerpt = body.length > EXCERPT_LENGTH ? `${body.slice(0, EXCERPT_LENGTH)}...` : body;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), excerpt: this.excerpt };
  }
}

export class ConfigError extends HmdaError {
  public readonly setting: string;

  constructor(setting: string, message: string) {
    super(ErrorCode.CONFIG_ERROR, message);
    this.name = 'ConfigError';
    this.setting = setting;
  }

  toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), setting: this.setting };
  }
}
