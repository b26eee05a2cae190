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

import { existsSync, readFileSync } from 'fs';

import * as dotenv from 'dotenv';
import { DateTime } from 'luxon';
import { z } from 'zod';

import {
  AccessTokenProvider,
  StaticAccessTokenProvider,
} from '../auth/access_token_provider';
import { BuildsClient } from '../services/builds';
import {
  FetchTransport,
  RpcClient,
  Transport,
} from '../../generic_libs/tools/rpc_client';

export type Env = Readonly<Record<string, string | undefined>>;

export interface BuildsClientConfig {
  readonly serviceUri: string;
  readonly accessToken?: string;
  readonly accessTokenExpiry?: DateTime;
  readonly serviceAccountJson?: string;
  readonly rpcTimeoutMs?: number;
  readonly isDevelopmentEnvironment: boolean;
}

// Empty variables are treated as unset.
const optionalVar = z
  .string()
  .optional()
  .transform((value) => value || undefined);

function envVar<T>(describe: string, parse: (value: string) => T | undefined) {
  return optionalVar.transform((value, ctx) => {
    if (value === undefined) {
      return undefined;
    }
    const ret = parse(value);
    if (ret === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `must be ${describe}, got "${value}"`,
      });
      return z.NEVER;
    }
    return ret;
  });
}

const envSchema = z.object({
  BUILDS_SERVICE_URI: z
    .string({ required_error: 'is not set' })
    .min(1, 'is not set'),
  BUILDS_ACCESS_TOKEN: optionalVar,
  BUILDS_ACCESS_TOKEN_EXPIRY: envVar('an ISO 8601 timestamp', (value) => {
    const time = DateTime.fromISO(value, { zone: 'utc' });
    return time.isValid ? time : undefined;
  }),
  BUILDS_SERVICE_ACCOUNT_JSON: optionalVar,
  BUILDS_RPC_TIMEOUT_MS: envVar('a positive integer', (value) => {
    const num = Number(value);
    return Number.isSafeInteger(num) && num > 0 ? num : undefined;
  }),
  BUILDS_DEVELOPMENT_ENVIRONMENT: envVar(
    'either "true" or "false"',
    (value) =>
      value === 'true' ? true : value === 'false' ? false : undefined,
  ).transform((value) => value ?? false),
});

/**
 * Reads the client config from environment variables.
 *
 * @throws {Error} listing every variable that is missing or malformed.
 */
export function readConfig(env: Env): BuildsClientConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    throw new Error(
      result.error.issues
        .map((issue) => `${issue.path.join('.')} ${issue.message}`)
        .join('; '),
    );
  }
  const vars = result.data;
  return {
    serviceUri: vars.BUILDS_SERVICE_URI,
    accessToken: vars.BUILDS_ACCESS_TOKEN,
    accessTokenExpiry: vars.BUILDS_ACCESS_TOKEN_EXPIRY,
    serviceAccountJson: vars.BUILDS_SERVICE_ACCOUNT_JSON,
    rpcTimeoutMs: vars.BUILDS_RPC_TIMEOUT_MS,
    isDevelopmentEnvironment: vars.BUILDS_DEVELOPMENT_ENVIRONMENT,
  };
}

/**
 * Reads the client config from `env`, falling back to the variables defined
 * in `envFile` when it exists. Variables in `env` take precedence.
 */
export function loadConfig(
  envFile = '.env',
  env: Env = process.env,
): BuildsClientConfig {
  const fromFile = existsSync(envFile)
    ? dotenv.parse(readFileSync(envFile))
    : {};
  return readConfig({ ...fromFile, ...env });
}

export interface BuildsClientOverrides {
  readonly transport?: Transport;
  readonly accessTokenProvider?: AccessTokenProvider;
}

export function createBuildsClientFromConfig(
  config: BuildsClientConfig,
  overrides: BuildsClientOverrides = {},
) {
  return new BuildsClient(
    new RpcClient({
      baseUri: config.serviceUri,
      transport:
        overrides.transport ||
        new FetchTransport({ timeoutMs: config.rpcTimeoutMs }),
      accessTokenProvider:
        overrides.accessTokenProvider ||
        new StaticAccessTokenProvider(
          config.accessToken,
          config.accessTokenExpiry,
        ),
      context: { isDevelopmentEnvironment: config.isDevelopmentEnvironment },
      serviceAccountJson: config.serviceAccountJson,
    }),
  );
}
