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

import { z } from 'zod';

import {
  JsonObject,
  JsonValue,
  Schema,
  compactObject,
  decodeJson,
  encodeInt64,
  int64,
  integer,
  jsonObject,
  optional,
  repeated,
  timestamp,
} from '../../../generic_libs/tools/json_codec';
import { EncodeError } from '../../../generic_libs/tools/rpc_client';

import {
  BatchRequest,
  BatchRequestItem,
  BatchResponse,
  BatchResponseItem,
  Build,
  BuildInput,
  BuildOutput,
  BuildPredicate,
  BuildRange,
  BuilderID,
  CancelBuildRequest,
  GerritChange,
  GetBuildRequest,
  GitilesCommit,
  Log,
  NotificationConfig,
  RequestedDimension,
  RpcStatus,
  STATUS_VALUES,
  ScheduleBuildRequest,
  SearchBuildsRequest,
  SearchBuildsResponse,
  StringPair,
  TRINARY_VALUES,
  TagMap,
} from './types';

// Shared messages.

export function encodeBuilderId(builder: BuilderID): JsonObject {
  return {
    project: builder.project,
    bucket: builder.bucket,
    builder: builder.builder,
  };
}

export const BuilderIDSchema: Schema<BuilderID> = z.object({
  project: z.string(),
  bucket: z.string(),
  builder: z.string(),
});

export const StringPairSchema: Schema<StringPair> = z.object({
  key: z.string(),
  value: z.string(),
});

/**
 * Flattens tags to a list of string pairs, in key order then value order.
 *
 * @throws {EncodeError} when a tag has no values. It would be dropped from
 * the wire.
 */
export function encodeTags(tags: TagMap): JsonValue[] {
  return Object.entries(tags).flatMap(([key, values]) => {
    if (values.length === 0) {
      throw new EncodeError(`tag "${key}" has no values`);
    }
    return values.map((value) => ({ key, value }));
  });
}

function groupTags(pairs: readonly StringPair[]): TagMap {
  const tags = new Map<string, string[]>();
  for (const { key, value } of pairs) {
    const values = tags.get(key);
    if (values) {
      values.push(value);
    } else {
      tags.set(key, [value]);
    }
  }
  return Object.fromEntries(tags);
}

export const TagsSchema: Schema<TagMap> =
  z.array(StringPairSchema).transform(groupTags);

/**
 * Field masks are encoded as a single comma separated string.
 *
 * @throws {EncodeError} when a path is empty or contains a comma.
 */
export function encodeFields(
  fields: readonly string[] | undefined,
): string | undefined {
  for (const path of fields ?? []) {
    if (path === '' || path.includes(',')) {
      throw new EncodeError(`invalid field mask path "${path}"`);
    }
  }
  return fields?.join(',');
}

export const FieldsSchema: Schema<readonly string[]> = z
  .string()
  .transform((str) => (str === '' ? [] : str.split(',')));

export function encodeGitilesCommit(commit: GitilesCommit): JsonObject {
  return compactObject({
    host: commit.host,
    project: commit.project,
    id: commit.id,
    ref: commit.ref,
    position: commit.position,
  });
}

export const GitilesCommitSchema: Schema<GitilesCommit> = z.object({
  host: z.string(),
  project: z.string(),
  id: optional(z.string()),
  ref: optional(z.string()),
  position: optional(integer),
});

export function encodeGerritChange(change: GerritChange): JsonObject {
  return compactObject({
    host: change.host,
    project: change.project,
    change: encodeInt64(change.change),
    patchset: encodeInt64(change.patchset),
  });
}

export const GerritChangeSchema: Schema<GerritChange> = z.object({
  host: z.string(),
  project: optional(z.string()),
  change: int64,
  patchset: int64,
});

// A google.protobuf.Duration is encoded as a number of seconds followed by
// "s", e.g. "3.5s".
const DURATION_RE = /^(-?\d+(?:\.\d+)?)s$/;

/**
 * @throws {EncodeError} when `seconds` is not a whole number of nanoseconds.
 */
export function encodeDuration(seconds: number | undefined) {
  if (seconds === undefined) {
    return undefined;
  }
  const text = `${seconds.toFixed(9).replace(/\.?0+$/, '')}s`;
  const match = DURATION_RE.exec(text);
  if (!match || Number(match[1]) !== seconds) {
    throw new EncodeError(`${seconds} seconds is not a valid duration`);
  }
  return text;
}

export const DurationSchema: Schema<number> = z
  .string()
  .transform((str, ctx) => {
    const match = DURATION_RE.exec(str);
    if (!match) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `invalid duration "${str}"`,
      });
      return z.NEVER;
    }
    return Number(match[1]);
  });

export function encodeRequestedDimension(dim: RequestedDimension): JsonObject {
  return compactObject({
    key: dim.key,
    value: dim.value,
    expiration: encodeDuration(dim.expiration),
  });
}

export const RequestedDimensionSchema: Schema<RequestedDimension> = z.object({
  key: z.string(),
  value: z.string(),
  expiration: optional(DurationSchema),
});

export function encodeNotificationConfig(notify: NotificationConfig) {
  return compactObject({
    pubsubTopic: notify.pubsubTopic,
    userData: notify.userData,
  });
}

export const NotificationConfigSchema: Schema<NotificationConfig> = z.object({
  pubsubTopic: z.string(),
  userData: optional(z.string()),
});

/**
 * Returns the only case set in a oneof-like message.
 */
function oneof<T>(
  ctx: z.RefinementCtx,
  cases: readonly (readonly [string, T | undefined])[],
): T {
  const set = cases.flatMap(([name, value]) =>
    value === undefined ? [] : [{ name, value }],
  );
  if (set.length !== 1) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message:
        `expected exactly one of ${cases.map(([name]) => name).join(', ')}, ` +
        `got [${set.map(({ name }) => name).join(', ')}]`,
    });
    return z.NEVER;
  }
  return set[0].value;
}

// Requests.

export function encodeScheduleBuildRequest(
  req: ScheduleBuildRequest,
): JsonObject {
  return compactObject({
    requestId: req.requestId,
    builder: encodeBuilderId(req.builder),
    canary: req.canary,
    experimental: req.experimental,
    gitilesCommit: req.gitilesCommit && encodeGitilesCommit(req.gitilesCommit),
    gerritChanges: req.gerritChanges?.map(encodeGerritChange),
    properties: req.properties,
    dimensions: req.dimensions?.map(encodeRequestedDimension),
    priority: req.priority,
    tags: req.tags && encodeTags(req.tags),
    notify: req.notify && encodeNotificationConfig(req.notify),
    fields: encodeFields(req.fields),
  });
}

export const ScheduleBuildRequestSchema: Schema<ScheduleBuildRequest> =
  z.object({
    requestId: optional(z.string()),
    builder: BuilderIDSchema,
    canary: optional(z.enum(TRINARY_VALUES)),
    experimental: optional(z.enum(TRINARY_VALUES)),
    gitilesCommit: optional(GitilesCommitSchema),
    gerritChanges: optional(z.array(GerritChangeSchema)),
    properties: optional(jsonObject),
    dimensions: optional(z.array(RequestedDimensionSchema)),
    priority: optional(integer),
    tags: optional(TagsSchema),
    notify: optional(NotificationConfigSchema),
    fields: optional(FieldsSchema),
  });

export function encodeCancelBuildRequest(req: CancelBuildRequest): JsonObject {
  return compactObject({
    id: encodeInt64(req.id),
    summaryMarkdown: req.summaryMarkdown,
    fields: encodeFields(req.fields),
  });
}

export const CancelBuildRequestSchema: Schema<CancelBuildRequest> = z.object({
  id: int64,
  summaryMarkdown: z.string(),
  fields: optional(FieldsSchema),
});

export function encodeGetBuildRequest(req: GetBuildRequest): JsonObject {
  return compactObject({
    id: encodeInt64(req.id),
    builder: req.builder && encodeBuilderId(req.builder),
    buildNumber: req.buildNumber,
    fields: encodeFields(req.fields),
  });
}

export const GetBuildRequestSchema: Schema<GetBuildRequest> = z.object({
  id: optional(int64),
  builder: optional(BuilderIDSchema),
  buildNumber: optional(integer),
  fields: optional(FieldsSchema),
});

function encodeBuildRange(range: BuildRange): JsonObject {
  return compactObject({
    startBuildId: encodeInt64(range.startBuildId),
    endBuildId: encodeInt64(range.endBuildId),
  });
}

const BuildRangeSchema: Schema<BuildRange> = z.object({
  startBuildId: optional(int64),
  endBuildId: optional(int64),
});

export function encodeBuildPredicate(predicate: BuildPredicate): JsonObject {
  return compactObject({
    builder: predicate.builder && encodeBuilderId(predicate.builder),
    status: predicate.status,
    gerritChanges: predicate.gerritChanges?.map(encodeGerritChange),
    createdBy: predicate.createdBy,
    tags: predicate.tags && encodeTags(predicate.tags),
    build: predicate.build && encodeBuildRange(predicate.build),
    experimental: predicate.experimental,
    includeExperimental: predicate.includeExperimental,
  });
}

export const BuildPredicateSchema: Schema<BuildPredicate> = z.object({
  builder: optional(BuilderIDSchema),
  status: optional(z.enum(STATUS_VALUES)),
  gerritChanges: optional(z.array(GerritChangeSchema)),
  createdBy: optional(z.string()),
  tags: optional(TagsSchema),
  build: optional(BuildRangeSchema),
  experimental: optional(z.boolean()),
  includeExperimental: optional(z.boolean()),
});

export function encodeSearchBuildsRequest(
  req: SearchBuildsRequest,
): JsonObject {
  return compactObject({
    predicate: req.predicate && encodeBuildPredicate(req.predicate),
    pageSize: req.pageSize,
    pageToken: req.pageToken,
    fields: encodeFields(req.fields),
  });
}

export const SearchBuildsRequestSchema: Schema<SearchBuildsRequest> =
  z.object({
    predicate: optional(BuildPredicateSchema),
    pageSize: optional(integer),
    pageToken: optional(z.string()),
    fields: optional(FieldsSchema),
  });

function encodeBatchRequestItem(item: BatchRequestItem): JsonObject {
  if ('getBuild' in item) {
    return { getBuild: encodeGetBuildRequest(item.getBuild) };
  }
  if ('searchBuilds' in item) {
    return { searchBuilds: encodeSearchBuildsRequest(item.searchBuilds) };
  }
  if ('scheduleBuild' in item) {
    return { scheduleBuild: encodeScheduleBuildRequest(item.scheduleBuild) };
  }
  return { cancelBuild: encodeCancelBuildRequest(item.cancelBuild) };
}

const BatchRequestItemSchema: Schema<BatchRequestItem> = z
  .object({
    getBuild: optional(GetBuildRequestSchema),
    searchBuilds: optional(SearchBuildsRequestSchema),
    scheduleBuild: optional(ScheduleBuildRequestSchema),
    cancelBuild: optional(CancelBuildRequestSchema),
  })
  .transform((item, ctx) =>
    oneof<BatchRequestItem>(ctx, [
      ['getBuild', item.getBuild && { getBuild: item.getBuild }],
      [
        'searchBuilds',
        item.searchBuilds && { searchBuilds: item.searchBuilds },
      ],
      [
        'scheduleBuild',
        item.scheduleBuild && { scheduleBuild: item.scheduleBuild },
      ],
      ['cancelBuild', item.cancelBuild && { cancelBuild: item.cancelBuild }],
    ]),
  );

export function encodeBatchRequest(req: BatchRequest): JsonObject {
  return { requests: req.requests.map(encodeBatchRequestItem) };
}

export const BatchRequestSchema: Schema<BatchRequest> = z.object({
  requests: repeated(BatchRequestItemSchema),
});

// Responses.

// Some servers report `experimental` as a trinary instead of a boolean.
const ExperimentalSchema = z
  .union([z.boolean(), z.enum(TRINARY_VALUES)])
  .transform((value) =>
    typeof value === 'boolean'
      ? value
      : value === 'UNSET'
        ? undefined
        : value === 'YES',
  );

const BuildInputSchema: Schema<BuildInput> = z.object({
  properties: optional(jsonObject),
  gitilesCommit: optional(GitilesCommitSchema),
  gerritChanges: optional(z.array(GerritChangeSchema)),
  experimental: optional(ExperimentalSchema),
});

const LogSchema: Schema<Log> = z.object({
  name: z.string(),
  viewUrl: optional(z.string()),
  url: optional(z.string()),
});

const BuildOutputSchema: Schema<BuildOutput> = z.object({
  properties: optional(jsonObject),
  gitilesCommit: optional(GitilesCommitSchema),
  logs: repeated(LogSchema),
});

export const BuildSchema: Schema<Build> = z.object({
  id: int64,
  builder: BuilderIDSchema,
  number: optional(integer),
  createdBy: optional(z.string()),
  canceledBy: optional(z.string()),
  createTime: optional(timestamp),
  startTime: optional(timestamp),
  endTime: optional(timestamp),
  updateTime: optional(timestamp),
  status: z.enum(STATUS_VALUES),
  summaryMarkdown: optional(z.string()),
  input: optional(BuildInputSchema),
  output: optional(BuildOutputSchema),
  tags: repeated(StringPairSchema),
});

export const SearchBuildsResponseSchema: Schema<SearchBuildsResponse> =
  z.object({
    builds: repeated(BuildSchema),
    nextPageToken: optional(z.string()),
  });

const RpcStatusSchema: Schema<RpcStatus> = z.object({
  code: integer.nullish().transform((code) => code ?? 0),
  message: optional(z.string()),
  details: optional(z.array(jsonObject)),
});

const BatchResponseItemSchema: Schema<BatchResponseItem> = z
  .object({
    getBuild: optional(BuildSchema),
    searchBuilds: optional(SearchBuildsResponseSchema),
    scheduleBuild: optional(BuildSchema),
    cancelBuild: optional(BuildSchema),
    error: optional(RpcStatusSchema),
  })
  .transform((item, ctx) =>
    oneof<BatchResponseItem>(ctx, [
      ['getBuild', item.getBuild && { getBuild: item.getBuild }],
      [
        'searchBuilds',
        item.searchBuilds && { searchBuilds: item.searchBuilds },
      ],
      [
        'scheduleBuild',
        item.scheduleBuild && { scheduleBuild: item.scheduleBuild },
      ],
      ['cancelBuild', item.cancelBuild && { cancelBuild: item.cancelBuild }],
      ['error', item.error && { error: item.error }],
    ]),
  );

export const BatchResponseSchema: Schema<BatchResponse> = z.object({
  responses: repeated(BatchResponseItemSchema),
});

// Decoders of whole messages. They throw `DecodeError`.

export const decodeScheduleBuildRequest = (json: unknown) =>
  decodeJson(ScheduleBuildRequestSchema, json);
export const decodeCancelBuildRequest = (json: unknown) =>
  decodeJson(CancelBuildRequestSchema, json);
export const decodeGetBuildRequest = (json: unknown) =>
  decodeJson(GetBuildRequestSchema, json);
export const decodeSearchBuildsRequest = (json: unknown) =>
  decodeJson(SearchBuildsRequestSchema, json);
export const decodeBatchRequest = (json: unknown) =>
  decodeJson(BatchRequestSchema, json);

export const decodeBuild = (json: unknown) => decodeJson(BuildSchema, json);
export const decodeSearchBuildsResponse = (json: unknown) =>
  decodeJson(SearchBuildsResponseSchema, json);
export const decodeBatchResponse = (json: unknown) =>
  decodeJson(BatchResponseSchema, json);
