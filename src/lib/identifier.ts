/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import {
  ADQL_COMPOUND_TABLE_REGEX,
  ADQL_IDENTIFIER_REGEX,
} from '../constants.js';
import { InvalidIdentifierError } from './error.js';
import type {
  IdentifierKind,
  KnownIdentifier,
  ParsedIdentifier,
} from '../types.js';

export const MAX_IDENTIFIER_LENGTH = 512;

const SCHEME_REGEX = /^([a-z][a-z0-9+.-]*):/;
// Printable ASCII without whitespace, quotes, angle brackets or backslashes
const ALLOWED_CHARACTERS_REGEX = /^[!#-;=?-[\]-~]+$/;

const BUTLER_REGEX = /^butler:\/\/([A-Za-z0-9_.-]+)\/([a-f0-9-]+)$/;
const IMAGE_REGEX = /^img:([A-Za-z0-9_.-]{1,128})$/;
const CATALOG_ROW_REGEX = /^row:([^/]+)\/([^/]+)\/(-?[0-9]{1,20})$/;

/**
 * Parse an identifier into one of the recognized shapes.
 *
 * Identifiers that are structurally valid but use an unrecognized scheme are
 * returned as `Unknown`. Identifiers without a scheme, with disallowed
 * characters, or that use a recognized scheme incorrectly are rejected.
 */
export function parseIdentifier(
  identifier: string,
  { defaultRepository = 'default' }: { defaultRepository?: string } = {},
): ParsedIdentifier {
  if (identifier.length === 0 || identifier.length > MAX_IDENTIFIER_LENGTH) {
    throw new InvalidIdentifierError(
      identifier,
      `length must be between 1 and ${MAX_IDENTIFIER_LENGTH}`,
    );
  }

  if (!ALLOWED_CHARACTERS_REGEX.test(identifier)) {
    throw new InvalidIdentifierError(identifier, 'contains invalid characters');
  }

  const schemeMatch = identifier.match(SCHEME_REGEX);
  if (schemeMatch === null) {
    throw new InvalidIdentifierError(identifier, 'missing scheme');
  }
  const scheme = schemeMatch[1];

  switch (scheme) {
    case 'butler': {
      const match = identifier.match(BUTLER_REGEX);
      if (match === null) {
        throw new InvalidIdentifierError(identifier);
      }
      return {
        kind: 'Image',
        raw: identifier,
        repository: match[1],
        datasetId: match[2],
      };
    }
    case 'img': {
      const match = identifier.match(IMAGE_REGEX);
      if (match === null) {
        throw new InvalidIdentifierError(identifier);
      }
      return {
        kind: 'Image',
        raw: identifier,
        repository: defaultRepository,
        datasetId: match[1],
      };
    }
    case 'row': {
      const match = identifier.match(CATALOG_ROW_REGEX);
      if (
        match === null ||
        !ADQL_COMPOUND_TABLE_REGEX.test(match[1]) ||
        !ADQL_IDENTIFIER_REGEX.test(match[2])
      ) {
        throw new InvalidIdentifierError(identifier);
      }
      return {
        kind: 'CatalogRow',
        raw: identifier,
        table: match[1],
        column: match[2],
        value: match[3],
      };
    }
    default:
      return { kind: 'Unknown', raw: identifier, scheme };
  }
}

export function classify(identifier: string): IdentifierKind {
  return parseIdentifier(identifier).kind;
}

/**
 * Parse an identifier for a caller that needs a link-producing kind.
 * `Unknown` identifiers are rejected.
 */
export function requireKnownKind(
  identifier: string,
  options?: { defaultRepository?: string },
): KnownIdentifier {
  const parsed = parseIdentifier(identifier, options);
  if (parsed.kind === 'Unknown') {
    throw new InvalidIdentifierError(
      identifier,
      `unsupported scheme ${parsed.scheme}`,
    );
  }
  return parsed;
}
