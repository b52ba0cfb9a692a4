import { Capability } from '../types';

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly errorCode?: string;

  constructor(
    message: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    errorCode?: string
  ) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.errorCode = errorCode;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, true, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(message, 500, false, 'CONFIGURATION_ERROR');
    this.name = 'ConfigurationError';
  }
}

/**
 * Every candidate endpoint for a capability is circuit-open or disabled.
 */
export class NoHealthyEngineError extends AppError {
  public readonly capability: Capability;

  constructor(capability: Capability, detail?: string) {
    super(
      `No healthy engine available for ${capability}${detail ? `: ${detail}` : ''}`,
      503,
      true,
      'NO_HEALTHY_ENGINE'
    );
    this.name = 'NoHealthyEngineError';
    this.capability = capability;
  }
}

/**
 * Transport failure, non-success response or malformed payload from an engine.
 */
export class EngineCallError extends AppError {
  public readonly endpoint: string;
  public readonly upstreamStatus?: number;

  constructor(endpoint: string, message: string, upstreamStatus?: number) {
    super(`Engine call to ${endpoint} failed: ${message}`, 502, true, 'ENGINE_CALL_ERROR');
    this.name = 'EngineCallError';
    this.endpoint = endpoint;
    this.upstreamStatus = upstreamStatus;
  }
}

export class EngineTimeoutError extends AppError {
  public readonly endpoint: string;
  public readonly timeoutMs: number;

  constructor(endpoint: string, timeoutMs: number, reason: string = 'engine deadline exceeded') {
    super(`Engine call to ${endpoint} timed out after ${timeoutMs}ms (${reason})`, 504, true, 'ENGINE_TIMEOUT');
    this.name = 'EngineTimeoutError';
    this.endpoint = endpoint;
    this.timeoutMs = timeoutMs;
  }
}

export class UnknownCapabilityError extends AppError {
  public readonly capability: string;

  constructor(capability: string) {
    super(`No model versions registered for capability ${capability}`, 500, false, 'UNKNOWN_CAPABILITY');
    this.name = 'UnknownCapabilityError';
    this.capability = capability;
  }
}

export class RequestNotFoundError extends AppError {
  public readonly requestId: string;

  constructor(requestId: string) {
    super(`Detection request ${requestId} not found`, 404, true, 'REQUEST_NOT_FOUND');
    this.name = 'RequestNotFoundError';
    this.requestId = requestId;
  }
}

export class ModelNotFoundError extends AppError {
  constructor(name: string, version: string) {
    super(`Model ${name}@${version} is not registered`, 404, true, 'MODEL_NOT_FOUND');
    this.name = 'ModelNotFoundError';
  }
}

export class ExperimentNotFoundError extends AppError {
  constructor(experimentId: string) {
    super(`A/B test ${experimentId} not found`, 404, true, 'EXPERIMENT_NOT_FOUND');
    this.name = 'ExperimentNotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCodeOf(error: unknown): string {
  if (error instanceof AppError && error.errorCode) {
    return error.errorCode;
  }
  return 'INTERNAL_ERROR';
}
