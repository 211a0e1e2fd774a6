import { errorMessage, type AppError } from '../../../common/types/errors.js';

export interface InvalidArgumentError extends AppError {
  readonly type: 'InvalidArgument';
  readonly value: unknown;
}

export interface FileNotFoundError extends AppError {
  readonly type: 'FileNotFound';
  readonly path: string;
}

export interface ParseFailureError extends AppError {
  readonly type: 'ParseFailure';
  readonly path: string;
  readonly details?: string[];
}

export interface InvalidStateError extends AppError {
  readonly type: 'InvalidState';
  readonly stateCode: number;
}

/**
 * A collaborator threw instead of returning a Result.
 * Only produced inside the year batch, where every failure is isolated.
 */
export interface UnexpectedError extends AppError {
  readonly type: 'Unexpected';
}

export type RecordLoadError = FileNotFoundError | ParseFailureError;

export type AccidentsError = InvalidArgumentError | RecordLoadError | UnexpectedError;

export type PlotStateError = InvalidArgumentError | RecordLoadError | InvalidStateError;

export const createInvalidArgumentError = (
  message: string,
  value: unknown
): InvalidArgumentError => ({
  type: 'InvalidArgument',
  message,
  value,
});

export const createFileNotFoundError = (path: string): FileNotFoundError => ({
  type: 'FileNotFound',
  message: `file '${path}' does not exist`,
  path,
});

export const createParseFailureError = (
  path: string,
  message: string,
  details?: string[]
): ParseFailureError => ({
  type: 'ParseFailure',
  message,
  path,
  ...(details !== undefined && details.length > 0 && { details }),
});

export const createInvalidStateError = (stateCode: number): InvalidStateError => ({
  type: 'InvalidState',
  message: `invalid STATE number: ${String(stateCode)}`,
  stateCode,
});

export const createUnexpectedError = (cause: unknown): UnexpectedError => ({
  type: 'Unexpected',
  message: errorMessage(cause),
  cause,
});
