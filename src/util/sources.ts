import fs from "node:fs";
import yaml from "js-yaml";
import { z } from "zod";

import { logger } from "./logger.js";
import { ConfigurationFailure, errorMessage } from "./errors.js";

export const FieldRuleSchema = z
  .object({
    selector: z.string().min(1).optional(),
    regex: z.string().min(1).optional(),
    attribute: z.string().min(1).optional(),
  })
  .refine((rule) => rule.selector !== undefined || rule.regex !== undefined, {
    message: "a field rule needs a selector or a regex",
  });

export type FieldRule = z.infer<typeof FieldRuleSchema>;

const FieldRulesSchema = z.array(FieldRuleSchema).min(1);

export const DETAIL_FIELDS = [
  "name",
  "address",
  "phone",
  "businessHours",
  "closedDays",
  "website",
  "benefits",
  "description",
  "parking",
  "postalCode",
  "category",
  "genre",
] as const;

export type DetailField = (typeof DETAIL_FIELDS)[number];

const PaginationSchema = z
  .object({
    startPage: z.number().int().min(0).default(1),
    endPage: z.number().int().min(0).nullable().default(null),
    maxEmptyPages: z.number().int().min(1).default(3),
    maxDuplicatePages: z.number().int().min(1).default(3),
    maxPages: z.number().int().min(1).optional(),
  })
  .refine((p) => p.endPage === null || p.endPage >= p.startPage, {
    message: "endPage must not be lower than startPage",
  });

const RateLimitSchema = z.union([
  z
    .object({ minWait: z.number().min(0), maxWait: z.number().min(0) })
    .refine((r) => r.minWait <= r.maxWait, { message: "minWait must not exceed maxWait" }),
  z.object({ requestsPerSecond: z.number().positive() }),
]);

export const SourceSchema = z.object({
  id: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, "ids are lowercase letters, digits and dashes"),
  name: z.string().min(1),
  baseUrl: z.string().url(),
  encoding: z.string().default("utf-8"),
  pagination: PaginationSchema.default({}),
  rateLimit: RateLimitSchema.optional(),
  session: z
    .object({
      url: z.string().url(),
      tokenPattern: z.string().min(1),
    })
    .optional(),
  listPage: z.object({
    // `{page}` and optional `{token}` placeholders
    url: z.string().refine((url) => url.includes("{page}"), {
      message: "list page url needs a {page} placeholder",
    }),
    linkSelector: z.string().min(1),
    detailPattern: z.string().optional(),
  }),
  detail: z.object({
    fields: z.object({
      name: FieldRulesSchema,
      address: FieldRulesSchema.optional(),
      phone: FieldRulesSchema.optional(),
      businessHours: FieldRulesSchema.optional(),
      closedDays: FieldRulesSchema.optional(),
      website: FieldRulesSchema.optional(),
      benefits: FieldRulesSchema.optional(),
      description: FieldRulesSchema.optional(),
      parking: FieldRulesSchema.optional(),
      postalCode: FieldRulesSchema.optional(),
      category: FieldRulesSchema.optional(),
      genre: FieldRulesSchema.optional(),
    }),
    extraFields: z.record(FieldRulesSchema).default({}),
  }),
});

export type SourceDefinition = z.infer<typeof SourceSchema>;

const SourcesFileSchema = z.object({
  sources: z.array(SourceSchema).min(1),
});

export function formatIssues(error: z.ZodError) {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

export function parseSources(text: string): SourceDefinition[] {
  let data: unknown;
  try {
    data = yaml.load(text);
  } catch (e) {
    throw new ConfigurationFailure(`Invalid sources YAML: ${errorMessage(e)}`, { cause: e });
  }

  const parsed = SourcesFileSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationFailure(`Invalid source definitions: ${formatIssues(parsed.error)}`);
  }

  const ids = new Set<string>();
  for (const source of parsed.data.sources) {
    if (ids.has(source.id)) {
      throw new ConfigurationFailure(`Duplicate source id: ${source.id}`);
    }
    ids.add(source.id);
  }

  return parsed.data.sources;
}

export function loadSources(filename: string): SourceDefinition[] {
  let text: string;
  try {
    text = fs.readFileSync(filename, "utf8");
  } catch (e) {
    throw new ConfigurationFailure(`Unable to read sources file ${filename}`, { cause: e });
  }

  const sources = parseSources(text);
  logger.info(
    `Loaded ${sources.length} source definitions`,
    { filename, sources: sources.map((source) => source.id) },
    "config",
  );
  return sources;
}
