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

/**
 * The server responded with a non-2xx HTTP status.
 *
 * `message` is the raw response body.
 */
export class ServiceError extends Error {
  override readonly name = 'ServiceError';

  constructor(
    readonly statusCode: number,
    readonly body: string,
  ) {
    super(body);
  }
}

/**
 * The response body could not be turned into the expected response type.
 * Either it is not valid JSON, or its shape does not match the schema.
 */
export class DecodeError extends Error {
  override readonly name = 'DecodeError';

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
  }
}

/**
 * The request cannot be encoded in a form the server would decode back to the
 * same request.
 */
export class EncodeError extends Error {
  override readonly name = 'EncodeError';
}
