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

export interface TransportResponse {
  readonly status: number;
  readonly body: Uint8Array;
}

/**
 * Sends HTTP POST requests.
 */
export interface Transport {
  post(
    url: string,
    headers: Readonly<Record<string, string>>,
    body: string,
  ): Promise<TransportResponse>;
}

export interface FetchTransportOptions {
  /**
   * Abort the request if it takes longer than this. Defaults to no timeout.
   */
  readonly timeoutMs?: number;
  /**
   * If supplied, use this function instead of fetch.
   */
  readonly fetchImpl?: typeof fetch;
}

/**
 * A `Transport` backed by `fetch`.
 */
export class FetchTransport implements Transport {
  readonly timeoutMs: number | undefined;
  readonly fetchImpl: typeof fetch;

  constructor(options: FetchTransportOptions = {}) {
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetchImpl || fetch;
  }

  async post(
    url: string,
    headers: Readonly<Record<string, string>>,
    body: string,
  ): Promise<TransportResponse> {
    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: { ...headers },
      body,
      ...(this.timeoutMs !== undefined && {
        signal: AbortSignal.timeout(this.timeoutMs),
      }),
    });
    return {
      status: response.status,
      body: new Uint8Array(await response.arrayBuffer()),
    };
  }
}
