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

import {
  AccessToken,
  AccessTokenProvider,
} from '../../auth/access_token_provider';
import { logging } from '../../tools/logging';
import {
  DecodeError,
  RpcClient,
  RpcCodec,
  ServiceError,
  TransportResponse,
} from '../../../generic_libs/tools/rpc_client';
import {
  readFixture,
  rpcResponse,
  textResponse,
} from '../../../testing_tools/fixtures';

import {
  BUILDS_CODECS,
  BuildsClient,
  BuildsMethodName,
  BuildsMethods,
} from './builds_client';
import {
  BatchRequest,
  BuilderID,
  CancelBuildRequest,
  GetBuildRequest,
  ScheduleBuildRequest,
  SearchBuildsRequest,
} from './types';

const builderId: BuilderID = {
  bucket: 'ci',
  builder: 'linux-rel',
  project: 'proj',
};

describe('BuildsClient', () => {
  let post: jest.Mock<
    Promise<TransportResponse>,
    [string, Readonly<Record<string, string>>, string]
  >;
  let createAccessToken: jest.Mock<
    Promise<AccessToken>,
    Parameters<AccessTokenProvider['createAccessToken']>
  >;
  let client: BuildsClient;

  beforeEach(() => {
    post = jest.fn();
    createAccessToken = jest.fn();
    createAccessToken.mockResolvedValue({
      type: 'Bearer',
      data: 'data',
      expiry: DateTime.utc(2119),
    });
    client = new BuildsClient(
      new RpcClient({
        baseUri: 'https://localhost',
        transport: { post },
        accessTokenProvider: { createAccessToken },
        context: { isDevelopmentEnvironment: false },
      }),
    );
  });

  /**
   * Checks that `call` sends `request` to `method` and returns what it
   * resolves to when the server responds with `response`.
   */
  async function httpTest<M extends BuildsMethodName, T>(
    method: M,
    request: BuildsMethods[M]['request'],
    response: TransportResponse,
    call: (client: BuildsClient) => Promise<T>,
  ): Promise<T> {
    post.mockResolvedValue(response);

    const result = await call(client);

    expect(post).toHaveBeenCalledTimes(1);
    const [url, headers, body] = post.mock.calls[0];
    expect(url).toEqual(`https://localhost/${method}`);
    expect(headers['content-type']).toEqual('application/json');
    expect(headers['accept']).toEqual('application/json');
    expect(headers['authorization']).toEqual('Bearer data');
    const codec: RpcCodec<
      BuildsMethods[M]['request'],
      BuildsMethods[M]['response']
    > = BUILDS_CODECS[method];
    expect(body).toEqual(JSON.stringify(codec.encodeRequest(request)));
    return result;
  }

  describe('errors', () => {
    let logWarnMock: jest.SpyInstance;

    beforeEach(() => {
      logWarnMock = jest.spyOn(logging, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
      logWarnMock.mockRestore();
    });

    it('should throw the right exception', async () => {
      post.mockResolvedValue(textResponse('Error', 403));

      const call = client.batch({ requests: [] });

      await expect(call).rejects.toThrow(ServiceError);
      await expect(call).rejects.toMatchObject({
        statusCode: 403,
        message: 'Error',
      });
      expect(post.mock.calls[0][0]).toEqual('https://localhost/Batch');
    });

    it('should throw DecodeError when the build is malformed', async () => {
      post.mockResolvedValue(rpcResponse('{"id":"1","status":"SUCCESS"}'));

      const call = client.getBuild({ id: 1n });

      await expect(call).rejects.toThrow(
        new DecodeError('$.builder: Required'),
      );
    });
  });

  it('ScheduleBuild', async () => {
    const request: ScheduleBuildRequest = {
      builder: builderId,
      experimental: 'YES',
      tags: {
        user_agent: ['example_agent'],
        cl: ['true', '1'],
      },
      properties: {
        git_url: 'https://git.example.com/example/repo',
        git_ref: 'refs/changes/01/1/1',
      },
    };

    const build = await httpTest(
      'ScheduleBuild',
      request,
      rpcResponse(readFixture('build.json'), 202),
      (client) => client.scheduleBuild(request),
    );

    expect(build.id).toEqual(123n);
    expect(build.tags.length).toEqual(2);
    expect(post.mock.calls[0][2]).toEqual(
      '{"builder":{"project":"proj","bucket":"ci","builder":"linux-rel"},' +
        '"experimental":"YES",' +
        '"properties":{"git_url":"https://git.example.com/example/repo",' +
        '"git_ref":"refs/changes/01/1/1"},' +
        '"tags":[{"key":"user_agent","value":"example_agent"},' +
        '{"key":"cl","value":"true"},{"key":"cl","value":"1"}]}',
    );
  });

  it('CancelBuild', async () => {
    const request: CancelBuildRequest = {
      id: 1234n,
      summaryMarkdown: 'No longer needed.',
    };

    const build = await httpTest(
      'CancelBuild',
      request,
      rpcResponse(readFixture('build.json'), 202),
      (client) => client.cancelBuild(request),
    );

    expect(build.id).toEqual(123n);
    expect(build.tags.length).toEqual(2);
  });

  it('Batch', async () => {
    const request: BatchRequest = {
      requests: [{ getBuild: { builder: builderId, buildNumber: 123 } }],
    };

    const response = await httpTest(
      'Batch',
      request,
      rpcResponse(readFixture('batch.json'), 202),
      (client) => client.batch(request),
    );

    expect(response.responses.length).toEqual(1);
    const item = response.responses[0];
    if (!('getBuild' in item)) {
      throw new Error('expected a getBuild response');
    }
    expect(item.getBuild.status).toEqual('SUCCESS');
    expect(item.getBuild.id).toEqual(8907827286280251904n);
  });

  it('GetBuild', async () => {
    const request: GetBuildRequest = { id: 1234n };

    const build = await httpTest(
      'GetBuild',
      request,
      rpcResponse(readFixture('build.json'), 202),
      (client) => client.getBuild(request),
    );

    expect(build.id).toEqual(123n);
    expect(build.status).toEqual('SCHEDULED');
    expect(build.number).toEqual(321);
    expect(build.canceledBy).toBeUndefined();
    expect(build.endTime).toBeUndefined();
    expect(build.startTime?.toISO()).toEqual('2024-03-01T11:00:00.000Z');
    expect(build.input?.experimental).toEqual(true);
    expect(build.tags).toEqual([
      { key: 'user_agent', value: 'example_agent' },
      { key: 'cl', value: '1' },
    ]);
    expect(post.mock.calls[0][2]).toEqual('{"id":"1234"}');
  });

  it('SearchBuilds', async () => {
    const request: SearchBuildsRequest = {
      predicate: {
        tags: {
          cl: ['1'],
        },
      },
    };

    const response = await httpTest(
      'SearchBuilds',
      request,
      rpcResponse(readFixture('search.json'), 202),
      (client) => client.searchBuilds(request),
    );

    expect(response.builds.length).toEqual(1);
    expect(response.builds[0].number).toEqual(9151);
    expect(response.builds[0].id).toEqual(8906840690092270320n);
    expect(response.builds[0].input?.gitilesCommit?.ref).toEqual(
      'refs/heads/main',
    );
    expect(response.nextPageToken).toEqual('page-2');
  });

  it('invoke should route by method name', async () => {
    post.mockResolvedValue(rpcResponse('{"builds":[]}'));

    const response = await client.invoke('SearchBuilds', {});

    expect(post.mock.calls[0][0]).toEqual('https://localhost/SearchBuilds');
    expect(post.mock.calls[0][2]).toEqual('{}');
    expect(response).toEqual({ builds: [] });
  });
});
