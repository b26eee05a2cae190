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

import {
  AccessTokenProvider,
  ClientContext,
} from '../../../common/auth/access_token_provider';
import { logging } from '../../../common/tools/logging';
import { JsonValue } from '../json_codec';

import { DecodeError, ServiceError } from './errors';
import { Transport } from './transport';

/**
 * Prepended to every JSON response body by the server so the response cannot
 * be executed as a script.
 */
export const XSSI_PREFIX = ")]}'";

/**
 * OAuth scopes requested for every RPC.
 */
export const RPC_SCOPES: readonly string[] = Object.freeze([
  'https://www.googleapis.com/auth/userinfo.email',
]);

/**
 * Converts a request to its JSON form, and the JSON form of the response back
 * to the response.
 */
export interface RpcCodec<Req, Res> {
  encodeRequest(request: Req): JsonValue;
  /**
   * @throws {DecodeError} when `json` does not match the response schema.
   */
  decodeResponse(json: unknown): Res;
}

export interface RpcClientOptions {
  /**
   * Base URI of the service. The method name is appended to it after a `/`.
   */
  readonly baseUri: string;
  readonly transport: Transport;
  readonly accessTokenProvider: AccessTokenProvider;
  readonly context: ClientContext;
  /**
   * Service account credentials passed to the `accessTokenProvider`.
   */
  readonly serviceAccountJson?: string;
}

/**
 * Strips the XSSI prefix from a response body and parses the rest as JSON.
 *
 * @throws {DecodeError} when the prefix is missing or the rest is not valid
 * JSON.
 */
export function parseRpcResponse(text: string): unknown {
  if (!text.startsWith(XSSI_PREFIX)) {
    throw new DecodeError('Invalid response: missing XSSI prefix');
  }
  try {
    return JSON.parse(text.slice(XSSI_PREFIX.length));
  } catch (e) {
    throw new DecodeError('Invalid response: malformed JSON', { cause: e });
  }
}

/**
 * Class for calling a JSON-over-HTTP RPC service.
 *
 * Each call makes exactly one HTTP request. Errors are never retried.
 */
export class RpcClient {
  readonly baseUri: string;
  readonly transport: Transport;
  readonly accessTokenProvider: AccessTokenProvider;
  readonly context: ClientContext;
  readonly serviceAccountJson: string | undefined;

  constructor(options: RpcClientOptions) {
    this.baseUri = options.baseUri;
    this.transport = options.transport;
    this.accessTokenProvider = options.accessTokenProvider;
    this.context = options.context;
    this.serviceAccountJson = options.serviceAccountJson;
  }

  /**
   * Send an RPC request.
   * @param method Method name.
   * @throws {TokenAcquisitionError} or whatever else the
   * `accessTokenProvider` throws, unchanged.
   * @throws {ServiceError} when the response has a non-2xx HTTP status.
   * @throws {DecodeError} when the response cannot be decoded.
   */
  async call<Req, Res>(
    method: string,
    request: Req,
    codec: RpcCodec<Req, Res>,
  ): Promise<Res> {
    const token = await this.accessTokenProvider.createAccessToken(
      this.context,
      {
        serviceAccountJson: this.serviceAccountJson,
        scopes: RPC_SCOPES,
      },
    );

    const url = `${this.baseUri}/${method}`;
    const response = await this.transport.post(
      url,
      {
        'content-type': 'application/json',
        accept: 'application/json',
        authorization: `Bearer ${token.data}`,
      },
      JSON.stringify(codec.encodeRequest(request)),
    );

    const text = new TextDecoder('utf-8').decode(response.body);
    if (response.status < 200 || response.status >= 300) {
      logging.warn(`RPC ${method} failed with HTTP status ${response.status}`);
      throw new ServiceError(response.status, text);
    }

    try {
      return codec.decodeResponse(parseRpcResponse(text));
    } catch (e) {
      if (e instanceof DecodeError) {
        logging.warn(`failed to decode the response of RPC ${method}:`, e);
      }
      throw e;
    }
  }
}
