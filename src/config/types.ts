/**
 * Client Configuration Types
 *
 * Schema for the multi-client YAML document. Each top-level key is a
 * client_id; the value describes that client's defaults, service rules,
 * spreadsheet column mapping and folders.
 */

import { z } from 'zod';
import { OPTIONAL_MAPPING_FIELDS, REQUIRED_MAPPING_FIELDS } from '../constants';

export type RequiredMappingField = typeof REQUIRED_MAPPING_FIELDS[number];
export type OptionalMappingField = typeof OPTIONAL_MAPPING_FIELDS[number];
export type MappingField = RequiredMappingField | OptionalMappingField;

export const TriggerSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('default') }),
    z.object({ type: z.literal('tag'), tag: z.string().trim().min(1, 'tag trigger is missing its tag') }),
]);

export const ServiceRuleSchema = z.object({
    name: z.string().min(1),
    code: z.string().optional(),
    trigger: TriggerSchema,
});

const WeightSchema = z.union([z.number(), z.string()])
    .transform(value => typeof value === 'number' ? value : Number(value.trim()))
    .refine(value => Number.isFinite(value) && value > 0, 'weight_kg must be a positive number');

export const DefaultsSchema = z.object({
    service: z.string().min(1),
    weight_kg: WeightSchema,
    country: z.string().optional(),
    reference_prefix: z.string().optional(),
});

const ColumnSchema = z.number().int('column must be an integer').min(1, 'column must be >= 1');

export const TemplateMappingSchema = z.object({
    full_name: ColumnSchema,
    address_line_1: ColumnSchema,
    address_line_2: ColumnSchema,
    town_city: ColumnSchema,
    county: ColumnSchema,
    postcode: ColumnSchema,
    country: ColumnSchema,
    service: ColumnSchema,
    weight_kg: ColumnSchema,
    reference: ColumnSchema.optional(),
    phone: ColumnSchema.optional(),
    email: ColumnSchema.optional(),
});

export const FoldersSchema = z.object({
    in_txt: z.string().optional(),
    ready_xlsx: z.string().optional(),
    archive: z.string().optional(),
    tracking_out: z.string().optional(),
    failures: z.string().optional(),
});

export const ClientEntrySchema = z.object({
    display_name: z.string().min(1),
    defaults: DefaultsSchema,
    services: z.array(ServiceRuleSchema).min(1, 'services must be a non-empty list'),
    template_mapping: TemplateMappingSchema,
    template_path: z.string().optional(),
    folders: FoldersSchema.nullish(),
});

export type ServiceTrigger = z.infer<typeof TriggerSchema>;
export type ServiceRule = z.infer<typeof ServiceRuleSchema>;
export type ClientDefaults = z.infer<typeof DefaultsSchema>;
export type TemplateMapping = z.infer<typeof TemplateMappingSchema>;
export type FolderOverrides = z.infer<typeof FoldersSchema>;

export interface ClientConfig extends z.infer<typeof ClientEntrySchema> {
    client_id: string;
}

/** Raw YAML document: client_id keys mapped to unvalidated entries. */
export type ConfigDocument = Record<string, unknown>;

/**
 * An immutable snapshot of every client's configuration. Reloading produces a
 * new snapshot with a higher version; batches keep the one they started with.
 */
export interface ClientConfigSet {
    readonly version: number;
    readonly source: string;
    readonly loadedAt: Date;
    readonly clients: Readonly<Record<string, ClientConfig>>;
}

export interface ClientFolders {
    in_txt: string;
    ready_xlsx: string;
    archive: string;
    tracking_out: string;
    failures: string;
}

export interface EffectiveSettings {
    client_id: string;
    display_name: string;
    defaults: ClientDefaults;
    services: ServiceRule[];
    template_mapping: TemplateMapping;
    template_path: string | null;
    folders: ClientFolders;
}

export interface ResolveOptions {
    clientsRoot: string;
    templatePath?: string | null;
}
