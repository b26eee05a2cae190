// Copyright 2024 The LUCI Authors.
//
// Licensed under the Apache License, Version 2.0 (the "License");
// you may not use this file except in compliance with the License.
// You may obtain a copy of the License at
//
//      http://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS,
// WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
// See the License for the specific language governing permissions and
// limitations under the License.

import { DateTime } from 'luxon';
import { z } from 'zod';

import { DecodeError } from '../rpc_client/errors';
import { isRecord } from '../utils';

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | JsonObject;

export interface JsonObject {
  readonly [key: string]: JsonValue;
}

/**
 * A schema that decodes a JSON value of any shape into `T`.
 */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

/**
 * Builds a JSON object, dropping the properties whose value is `undefined`.
 */
export function compactObject(
  obj: Readonly<Record<string, JsonValue | undefined>>,
): JsonObject {
  const ret: Record<string, JsonValue> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (value !== undefined) {
      ret[key] = value;
    }
  }
  return ret;
}

/**
 * Encodes an int64 the way the proto3 JSON mapping does, i.e. as a decimal
 * string.
 */
export function encodeInt64(value: bigint | undefined): string | undefined {
  return value === undefined ? undefined : value.toString();
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean'
  ) {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  return isRecord(value) && Object.values(value).every(isJsonValue);
}

/**
 * A free-form JSON object. The object is returned as is, so keys such as
 * `__proto__` are kept as own properties.
 */
export const jsonObject = z.custom<JsonObject>(
  (value) => isRecord(value) && Object.values(value).every(isJsonValue),
  'expected a JSON object',
);

/**
 * Builds a schema that turns a JSON value into `T` with `convert`, which
 * returns `undefined` when the value has the wrong shape.
 */
function converter<T>(
  message: string,
  convert: (value: unknown) => T | undefined,
) {
  return z.unknown().transform((value, ctx) => {
    const ret = value === undefined ? undefined : convert(value);
    if (ret === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: value === undefined ? 'Required' : message,
      });
      return z.NEVER;
    }
    return ret;
  });
}

const INTEGER_RE = /^-?\d+$/;

/**
 * An int32. Both JSON numbers and decimal strings are accepted.
 */
export const integer = converter('expected an integer', (value) => {
  const num =
    typeof value === 'string' && INTEGER_RE.test(value) ? Number(value) : value;
  return typeof num === 'number' && Number.isSafeInteger(num)
    ? num
    : undefined;
});

/**
 * An int64. Decimal strings and JSON numbers that are safe integers are
 * accepted.
 */
export const int64 = converter('expected an int64', (value) => {
  if (typeof value === 'string' && INTEGER_RE.test(value)) {
    return BigInt(value);
  }
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  return undefined;
});

/**
 * An RFC 3339 timestamp. Timestamps without an offset are interpreted in UTC.
 */
export const timestamp = converter(
  'expected an RFC 3339 timestamp',
  (value) => {
    if (typeof value !== 'string') {
      return undefined;
    }
    const time = DateTime.fromISO(value, { zone: 'utc' });
    return time.isValid ? time : undefined;
  },
);

/**
 * Makes `schema` optional. `null` is decoded as `undefined`.
 */
export function optional<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().transform((value) => value ?? undefined);
}

/**
 * A list of `schema`. A missing list is decoded as `[]`.
 */
export function repeated<T extends z.ZodTypeAny>(schema: T) {
  return z
    .array(schema)
    .nullish()
    .transform((value) => value ?? []);
}

function formatPath(path: readonly (string | number)[]) {
  return path
    .map((seg) => (typeof seg === 'number' ? `[${seg}]` : `.${seg}`))
    .join('');
}

/**
 * Decodes `json` with `schema`.
 *
 * @throws {DecodeError} naming the path of every mismatch. The `ZodError` is
 * kept as the cause.
 */
export function decodeJson<T>(schema: Schema<T>, json: unknown): T {
  const result = schema.safeParse(json);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `$${formatPath(issue.path)}: ${issue.message}`)
      .join('; ');
    throw new DecodeError(message, { cause: result.error });
  }
  return result.data;
}
