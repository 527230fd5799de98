/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { GetObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import winston from 'winston';

import { SigningError } from '../lib/error.js';
import type {
  BackendCallOptions,
  ObjectReference,
  SignedUrl,
  UrlSigner,
} from '../types.js';

function schemeOf(uri: string): string {
  const separator = uri.indexOf(':');
  return separator > 0 ? uri.slice(0, separator).toLowerCase() : '';
}

/**
 * Passes through http(s) URLs the registry has already signed. When the
 * registry does not report an expiry, the URL is assumed to live for the
 * configured link lifetime.
 */
export class PresignedUrlSigner implements UrlSigner {
  private now: () => Date;

  constructor({ now = () => new Date() }: { now?: () => Date } = {}) {
    this.now = now;
  }

  async sign(reference: ObjectReference, ttlSeconds: number): Promise<SignedUrl> {
    const scheme = schemeOf(reference.uri);
    if (scheme !== 'https' && scheme !== 'http') {
      throw new SigningError(`Object URL ${reference.uri} was not signed`);
    }
    return {
      url: reference.uri,
      expiresAt:
        reference.expiresAt ??
        new Date(this.now().getTime() + ttlSeconds * 1000),
    };
  }
}

/**
 * Presigns `s3://bucket/key` references for GET.
 */
export class S3UrlSigner implements UrlSigner {
  private log: winston.Logger;
  private s3Client: S3Client;
  private now: () => Date;

  constructor({
    log,
    s3Client,
    now = () => new Date(),
  }: {
    log: winston.Logger;
    s3Client: S3Client;
    now?: () => Date;
  }) {
    this.log = log.child({ class: this.constructor.name });
    this.s3Client = s3Client;
    this.now = now;
  }

  async sign(
    reference: ObjectReference,
    ttlSeconds: number,
    options?: BackendCallOptions,
  ): Promise<SignedUrl> {
    const match = reference.uri.match(/^s3:\/\/([^/]+)\/(.+)$/);
    if (match === null) {
      throw new SigningError(`Not an S3 object URL: ${reference.uri}`);
    }
    const [, bucket, key] = match;
    options?.signal?.throwIfAborted();

    const signedAt = this.now();
    try {
      const url = await getSignedUrl(
        this.s3Client,
        new GetObjectCommand({ Bucket: bucket, Key: key }),
        { expiresIn: ttlSeconds, signingDate: signedAt },
      );
      this.log.debug('Signed S3 object URL', { bucket, key, ttlSeconds });
      return {
        url,
        expiresAt: new Date(signedAt.getTime() + ttlSeconds * 1000),
      };
    } catch (error: unknown) {
      throw new SigningError(`Unable to sign ${reference.uri}`, {
        cause: error,
      });
    }
  }
}

/**
 * Dispatches to a signer by the scheme of the reference URI.
 */
export class CompositeUrlSigner implements UrlSigner {
  private signers: Map<string, UrlSigner>;

  constructor({ signers }: { signers: Record<string, UrlSigner> }) {
    this.signers = new Map(Object.entries(signers));
  }

  async sign(
    reference: ObjectReference,
    ttlSeconds: number,
    options?: BackendCallOptions,
  ): Promise<SignedUrl> {
    const signer = this.signers.get(schemeOf(reference.uri));
    if (signer === undefined) {
      throw new SigningError(`Object URL ${reference.uri} was not signed`);
    }
    return signer.sign(reference, ttlSeconds, options);
  }
}
