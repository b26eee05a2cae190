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

/**
 * An OAuth access token.
 */
export interface AccessToken {
  /**
   * Token type. Usually `Bearer`.
   */
  readonly type: string;
  /**
   * The token itself.
   */
  readonly data: string;
  /**
   * `undefined` when the expiry is not known.
   */
  readonly expiry?: DateTime;
}

/**
 * Information about the environment the client runs in.
 */
export interface ClientContext {
  readonly isDevelopmentEnvironment: boolean;
}

export interface CreateAccessTokenOptions {
  /**
   * Service account credentials in JSON format, if any.
   */
  readonly serviceAccountJson?: string;
  readonly scopes: readonly string[];
}

/**
 * Mints access tokens for outgoing RPCs.
 */
export interface AccessTokenProvider {
  /**
   * @throws {TokenAcquisitionError} when a token cannot be acquired.
   */
  createAccessToken(
    context: ClientContext,
    options: CreateAccessTokenOptions,
  ): Promise<AccessToken>;
}

export class TokenAcquisitionError extends Error {
  override readonly name = 'TokenAcquisitionError';

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
  }
}

/**
 * An `AccessTokenProvider` that hands out a pre-issued token.
 *
 * Useful when the token is minted out of band (e.g. by
 * `gcloud auth print-access-token`) and passed to the process through its
 * environment. Without an `expiry` the token never expires as far as the
 * provider can tell, and the server decides.
 */
export class StaticAccessTokenProvider implements AccessTokenProvider {
  constructor(
    private readonly token: string | undefined,
    private readonly expiry?: DateTime,
    private readonly now: () => DateTime = () => DateTime.utc(),
  ) {}

  async createAccessToken(): Promise<AccessToken> {
    if (!this.token) {
      throw new TokenAcquisitionError('no access token is configured');
    }
    if (this.expiry && this.expiry.toMillis() <= this.now().toMillis()) {
      throw new TokenAcquisitionError(
        `the configured access token expired at ${this.expiry.toISO()}`,
      );
    }
    return { type: 'Bearer', data: this.token, expiry: this.expiry };
  }
}
