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

import { readFileSync } from 'fs';
import * as path from 'path';

import {
  TransportResponse,
  XSSI_PREFIX,
} from '../generic_libs/tools/rpc_client';

export function readFixture(name: string) {
  return readFileSync(path.join(__dirname, 'fixtures', name), 'utf-8');
}

/**
 * Returns a response the way the server sends it, i.e. with the XSSI prefix
 * in front of the JSON.
 */
export function rpcResponse(json: string, status = 200): TransportResponse {
  return textResponse(XSSI_PREFIX + '\n' + json, status);
}

export function textResponse(text: string, status: number): TransportResponse {
  return { status, body: new TextEncoder().encode(text) };
}
