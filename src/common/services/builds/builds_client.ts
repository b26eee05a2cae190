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

import { RpcClient, RpcCodec } from '../../../generic_libs/tools/rpc_client';

import {
  decodeBatchResponse,
  decodeBuild,
  decodeSearchBuildsResponse,
  encodeBatchRequest,
  encodeCancelBuildRequest,
  encodeGetBuildRequest,
  encodeScheduleBuildRequest,
  encodeSearchBuildsRequest,
} from './codecs';
import {
  BatchRequest,
  BatchResponse,
  Build,
  CancelBuildRequest,
  GetBuildRequest,
  ScheduleBuildRequest,
  SearchBuildsRequest,
  SearchBuildsResponse,
} from './types';

/**
 * The request and response type of each method of the builds service.
 */
export interface BuildsMethods {
  ScheduleBuild: { request: ScheduleBuildRequest; response: Build };
  CancelBuild: { request: CancelBuildRequest; response: Build };
  GetBuild: { request: GetBuildRequest; response: Build };
  SearchBuilds: {
    request: SearchBuildsRequest;
    response: SearchBuildsResponse;
  };
  Batch: { request: BatchRequest; response: BatchResponse };
}

export type BuildsMethodName = keyof BuildsMethods;

type BuildsCodecs = {
  readonly [M in BuildsMethodName]: RpcCodec<
    BuildsMethods[M]['request'],
    BuildsMethods[M]['response']
  >;
};

export const BUILDS_CODECS: BuildsCodecs = Object.freeze({
  ScheduleBuild: {
    encodeRequest: encodeScheduleBuildRequest,
    decodeResponse: decodeBuild,
  },
  CancelBuild: {
    encodeRequest: encodeCancelBuildRequest,
    decodeResponse: decodeBuild,
  },
  GetBuild: {
    encodeRequest: encodeGetBuildRequest,
    decodeResponse: decodeBuild,
  },
  SearchBuilds: {
    encodeRequest: encodeSearchBuildsRequest,
    decodeResponse: decodeSearchBuildsResponse,
  },
  Batch: {
    encodeRequest: encodeBatchRequest,
    decodeResponse: decodeBatchResponse,
  },
});

// A service to handle builds related RPCs.
export class BuildsClient {
  constructor(readonly client: RpcClient) {}

  /**
   * Calls `method` with `request`. The response type is determined by
   * `method`.
   */
  invoke<M extends BuildsMethodName>(
    method: M,
    request: BuildsMethods[M]['request'],
  ): Promise<BuildsMethods[M]['response']> {
    const codec: RpcCodec<
      BuildsMethods[M]['request'],
      BuildsMethods[M]['response']
    > = BUILDS_CODECS[method];
    return this.client.call(method, request, codec);
  }

  scheduleBuild(request: ScheduleBuildRequest) {
    return this.invoke('ScheduleBuild', request);
  }

  cancelBuild(request: CancelBuildRequest) {
    return this.invoke('CancelBuild', request);
  }

  getBuild(request: GetBuildRequest) {
    return this.invoke('GetBuild', request);
  }

  searchBuilds(request: SearchBuildsRequest) {
    return this.invoke('SearchBuilds', request);
  }

  /**
   * Sends several requests in one RPC. Sub-requests that fail are reported as
   * `{ error }` items in the response. They do not fail the whole call.
   */
  batch(request: BatchRequest) {
    return this.invoke('Batch', request);
  }
}
