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

import { JsonObject } from '../../../generic_libs/tools/json_codec';

/**
 * Manually coded type definitions for the builds service.
 *
 * int64 fields are `bigint`s. They are encoded as decimal strings on the wire.
 * Timestamps are luxon `DateTime`s in UTC.
 */

export const TRINARY_VALUES = ['UNSET', 'YES', 'NO'] as const;
export type Trinary = (typeof TRINARY_VALUES)[number];

export const STATUS_VALUES = [
  'SCHEDULED',
  'STARTED',
  'SUCCESS',
  'FAILURE',
  'INFRA_FAILURE',
  'CANCELED',
] as const;
export type Status = (typeof STATUS_VALUES)[number];

export interface BuilderID {
  readonly project: string;
  readonly bucket: string;
  readonly builder: string;
}

export interface StringPair {
  readonly key: string;
  readonly value: string;
}

/**
 * Tags keyed by tag name. Flattened to a list of `StringPair`s on the wire.
 */
export type TagMap = Readonly<Record<string, readonly string[]>>;

export interface GitilesCommit {
  // Gitiles hostname, e.g. "chromium.googlesource.com".
  readonly host: string;
  // Repository name on the host, e.g. "chromium/src".
  readonly project: string;
  // Commit hash.
  readonly id?: string;
  // Commit ref, e.g. "refs/heads/main".
  readonly ref?: string;
  readonly position?: number;
}

export interface GerritChange {
  // Gerrit hostname, e.g. "chromium-review.googlesource.com".
  readonly host: string;
  readonly project?: string;
  readonly change: bigint;
  readonly patchset: bigint;
}

export interface RequestedDimension {
  readonly key: string;
  readonly value: string;
  // In seconds.
  readonly expiration?: number;
}

export interface NotificationConfig {
  readonly pubsubTopic: string;
  // Base64 encoded.
  readonly userData?: string;
}

export interface BuildInput {
  readonly properties?: JsonObject;
  readonly gitilesCommit?: GitilesCommit;
  readonly gerritChanges?: readonly GerritChange[];
  readonly experimental?: boolean;
}

export interface Log {
  readonly name: string;
  readonly viewUrl?: string;
  readonly url?: string;
}

export interface BuildOutput {
  readonly properties?: JsonObject;
  readonly gitilesCommit?: GitilesCommit;
  readonly logs: readonly Log[];
}

export interface Build {
  readonly id: bigint;
  readonly builder: BuilderID;
  readonly number?: number;
  readonly createdBy?: string;
  readonly canceledBy?: string;
  readonly createTime?: DateTime;
  readonly startTime?: DateTime;
  readonly endTime?: DateTime;
  readonly updateTime?: DateTime;
  readonly status: Status;
  readonly summaryMarkdown?: string;
  readonly input?: BuildInput;
  readonly output?: BuildOutput;
  readonly tags: readonly StringPair[];
}

export interface ScheduleBuildRequest {
  /**
   * Used to deduplicate scheduling requests on the server.
   */
  readonly requestId?: string;
  readonly builder: BuilderID;
  readonly canary?: Trinary;
  readonly experimental?: Trinary;
  readonly gitilesCommit?: GitilesCommit;
  readonly gerritChanges?: readonly GerritChange[];
  readonly properties?: JsonObject;
  readonly dimensions?: readonly RequestedDimension[];
  readonly priority?: number;
  readonly tags?: TagMap;
  readonly notify?: NotificationConfig;
  /**
   * Field mask paths of the returned build.
   */
  readonly fields?: readonly string[];
}

export interface CancelBuildRequest {
  readonly id: bigint;
  readonly summaryMarkdown: string;
  readonly fields?: readonly string[];
}

/**
 * Either `id`, or `builder` and `buildNumber`, should be set.
 */
export interface GetBuildRequest {
  readonly id?: bigint;
  readonly builder?: BuilderID;
  readonly buildNumber?: number;
  readonly fields?: readonly string[];
}

export interface BuildRange {
  readonly startBuildId?: bigint;
  readonly endBuildId?: bigint;
}

export interface BuildPredicate {
  readonly builder?: BuilderID;
  readonly status?: Status;
  readonly gerritChanges?: readonly GerritChange[];
  readonly createdBy?: string;
  readonly tags?: TagMap;
  readonly build?: BuildRange;
  readonly experimental?: boolean;
  readonly includeExperimental?: boolean;
}

export interface SearchBuildsRequest {
  readonly predicate?: BuildPredicate;
  readonly pageSize?: number;
  readonly pageToken?: string;
  readonly fields?: readonly string[];
}

export interface SearchBuildsResponse {
  readonly builds: readonly Build[];
  readonly nextPageToken?: string;
}

export type BatchRequestItem =
  | { readonly getBuild: GetBuildRequest }
  | { readonly searchBuilds: SearchBuildsRequest }
  | { readonly scheduleBuild: ScheduleBuildRequest }
  | { readonly cancelBuild: CancelBuildRequest };

export interface BatchRequest {
  readonly requests: readonly BatchRequestItem[];
}

/**
 * The status of a failed sub-request in a batch.
 */
export interface RpcStatus {
  // gRPC code.
  readonly code: number;
  readonly message?: string;
  readonly details?: readonly JsonObject[];
}

export type BatchResponseItem =
  | { readonly getBuild: Build }
  | { readonly searchBuilds: SearchBuildsResponse }
  | { readonly scheduleBuild: Build }
  | { readonly cancelBuild: Build }
  | { readonly error: RpcStatus };

export interface BatchResponse {
  readonly responses: readonly BatchResponseItem[];
}
