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

export const LOG_PREFIX = '[builds-rpc-client]';

/**
 * Warnings from the client, tagged with `LOG_PREFIX`.
 *
 * Tests silence or assert them with `jest.spyOn(logging, 'warn')`. `console`
 * is looked up on every call so that spying on `console.warn` works too.
 */
export const logging = {
  warn: (...params: unknown[]) =>
    // eslint-disable-next-line no-console
    console.warn(LOG_PREFIX, ...params),
};
