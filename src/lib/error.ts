/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

interface DetailedErrorOptions {
  stack?: string;
  cause?: unknown;
  [key: string]: unknown;
}

export class DetailedError extends Error {
  constructor(message: string, options?: DetailedErrorOptions) {
    super(message);
    this.name = this.constructor.name;
    Object.assign(this, options);
    this.stack = options?.stack ?? new Error().stack;
  }

  toJSON() {
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    const { name, message, ...rest } = this;
    return {
      message: this.message,
      stack: this.stack,
      ...rest,
    };
  }
}

/**
 * The identifier could not be parsed into any recognized shape. Fatal for the
 * whole request.
 */
export class InvalidIdentifierError extends DetailedError {
  readonly errorType = 'id_malformed';

  constructor(
    public readonly identifier: string,
    reason?: string,
  ) {
    super(
      reason !== undefined
        ? `Unable to extract valid dataset ID from ${identifier}: ${reason}`
        : `Unable to extract valid dataset ID from ${identifier}`,
    );
  }
}

export class NotFoundError extends DetailedError {}

export class SigningError extends DetailedError {}

// Raised by the cutout locator when no endpoint serves a deployment
export class ServiceUnavailableError extends DetailedError {}

export class SourceUnavailableError extends DetailedError {}

export class MalformedEntryError extends DetailedError {}

export class CollectionListUnavailableError extends DetailedError {
  constructor(public readonly dataset: string) {
    super(`Collection list for ${dataset} is not yet available`);
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
