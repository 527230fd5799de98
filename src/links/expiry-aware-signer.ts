/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { SigningError, errorMessage } from '../lib/error.js';
import type {
  BackendCallOptions,
  ExpiryWindow,
  ObjectReference,
  SignedUrl,
  UrlSigner,
} from '../types.js';

/**
 * Wraps a {@link UrlSigner} for the duration of one link assembly and keeps
 * the earliest expiry of every URL it hands out.
 */
export class ExpiryAwareSigner {
  private signer: UrlSigner;
  private minExpiry: Date | undefined;

  constructor({ signer }: { signer: UrlSigner }) {
    this.signer = signer;
  }

  async sign(
    reference: ObjectReference,
    ttlSeconds: number,
    options?: BackendCallOptions,
  ): Promise<SignedUrl> {
    let signed: SignedUrl;
    try {
      signed = await this.signer.sign(reference, ttlSeconds, options);
    } catch (error) {
      if (error instanceof SigningError || options?.signal?.aborted === true) {
        throw error;
      }
      throw new SigningError(
        `Unable to sign ${reference.uri}: ${errorMessage(error)}`,
        { cause: error },
      );
    }

    this.track(signed.expiresAt);
    return signed;
  }

  track(expiresAt: Date | undefined) {
    if (expiresAt === undefined || Number.isNaN(expiresAt.getTime())) {
      return;
    }
    if (this.minExpiry === undefined || expiresAt < this.minExpiry) {
      this.minExpiry = expiresAt;
    }
  }

  get window(): ExpiryWindow | undefined {
    return this.minExpiry !== undefined
      ? { minExpiry: this.minExpiry }
      : undefined;
  }
}
