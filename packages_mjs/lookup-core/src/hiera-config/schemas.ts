import { z } from 'zod';
import { DataValue } from '../domain';

const NonEmptyString = z.string().min(1);

const StringOrList = z.union([NonEmptyString, z.array(NonEmptyString)]);

const NonEmptyList = z.array(NonEmptyString).min(1);

export const DataSchema: z.ZodType<DataValue> = z.lazy(() =>
    z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(DataSchema), z.record(DataSchema)])
);

/** Option names start with a letter and end with a letter or digit. */
export const OPTION_NAME = /^[A-Za-z](?:[0-9A-Za-z_-]*[0-9A-Za-z])?$/;

// ========== Version 3 ==========

export const HieraConfigV3Schema = z.object({
    version: z.literal(3),
    backends: StringOrList,
    hierarchy: StringOrList,
    logger: NonEmptyString,
    merge_behavior: z.enum(['native', 'array', 'deep', 'deeper']),
    deep_merge_options: z.record(NonEmptyString, z.union([z.string(), z.boolean()])),
});

export const V3_KEYS: readonly string[] = Object.keys(HieraConfigV3Schema.shape);

/** Per-backend section of a version 3 configuration. */
export const BackendSectionSchema = z.object({
    datadir: NonEmptyString.optional(),
}).catchall(z.unknown());

export type BackendSection = z.infer<typeof BackendSectionSchema>;

// ========== Version 4 ==========

export const HierarchyEntryV4Schema = z.object({
    backend: NonEmptyString,
    name: NonEmptyString,
    datadir: NonEmptyString.optional(),
    path: NonEmptyString.optional(),
    paths: z.array(NonEmptyString).optional(),
}).strict();

export const HieraConfigV4Schema = z.object({
    version: z.literal(4),
    datadir: NonEmptyString,
    hierarchy: z.array(HierarchyEntryV4Schema),
}).strict();

export type HieraConfigV4Document = z.infer<typeof HieraConfigV4Schema>;

// ========== Version 5 ==========

export const DefaultsV5Schema = z.object({
    data_hash: NonEmptyString.optional(),
    lookup_key: NonEmptyString.optional(),
    data_dig: NonEmptyString.optional(),
    datadir: NonEmptyString.optional(),
}).strict();

export const HierarchyEntryV5Schema = z.object({
    name: NonEmptyString,
    options: z.record(z.string().regex(OPTION_NAME, 'Invalid option name'), DataSchema).optional(),
    data_hash: NonEmptyString.optional(),
    lookup_key: NonEmptyString.optional(),
    v4_data_hash: NonEmptyString.optional(),
    data_dig: NonEmptyString.optional(),
    path: NonEmptyString.optional(),
    paths: NonEmptyList.optional(),
    glob: NonEmptyString.optional(),
    globs: NonEmptyList.optional(),
    uri: NonEmptyString.optional(),
    uris: NonEmptyList.optional(),
    datadir: NonEmptyString.optional(),
}).strict();

export const HieraConfigV5Schema = z.object({
    version: z.literal(5),
    defaults: DefaultsV5Schema.optional(),
    hierarchy: z.array(HierarchyEntryV5Schema),
}).strict();

export type DefaultsV5 = z.infer<typeof DefaultsV5Schema>;
export type HierarchyEntryV5 = z.infer<typeof HierarchyEntryV5Schema>;
export type HieraConfigV5Document = z.infer<typeof HieraConfigV5Schema>;

export function formatIssues(error: z.ZodError): string {
    return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}
