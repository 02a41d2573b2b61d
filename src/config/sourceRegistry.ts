import { z } from "zod";

export const SUPPORTED_PROTOCOLS = ["http:", "https:", "ftp:"] as const;

function compiles(pattern: string, flags?: string): boolean {
  try {
    new RegExp(pattern, flags);
    return true;
  } catch {
    return false;
  }
}

function protocolOf(endpoint: string): string | null {
  try {
    return new URL(endpoint).protocol;
  } catch {
    return null;
  }
}

const RegexSchema = z.string().min(1).refine((value) => compiles(value), {
  message: "Invalid regular expression"
});

const ListingOrderSchema = z.enum(["lexicographic", "natural", "date"]);

const PostProcessShape = {
  pattern: RegexSchema.optional(),
  template: z.string().min(1).optional(),
  dateFormat: z.boolean().optional()
};

const PatternMatchConfigSchema = z
  .object({
    pattern: z.string().min(1),
    flags: z.string().regex(/^[imsu]*$/, "Only i, m, s and u flags are allowed").optional(),
    selector: z.string().min(1).optional(),
    template: z.string().min(1).optional(),
    dateFormat: z.boolean().optional()
  })
  .refine((config) => compiles(config.pattern, config.flags), {
    message: "Invalid regular expression",
    path: ["pattern"]
  });

const StructuredLookupConfigSchema = z
  .object({
    jsonPath: z.string().min(1).optional(),
    xpath: z.string().min(1).optional(),
    pick: z.enum(["first", "newest"]).default("first"),
    order: ListingOrderSchema.default("lexicographic"),
    ...PostProcessShape
  })
  .refine((config) => (config.jsonPath === undefined) !== (config.xpath === undefined), {
    message: "Exactly one of jsonPath or xpath is required"
  });

const ListingNewestConfigSchema = z.object({
  entryPattern: RegexSchema.optional(),
  order: ListingOrderSchema.default("lexicographic"),
  template: z.string().min(1).optional(),
  dateFormat: z.boolean().optional()
});

const HeaderDerivedConfigSchema = z.object({
  header: z.string().min(1),
  ...PostProcessShape
});

const BaseSourceSchema = z.object({
  id: z.string().min(1),
  endpoint: z.string().url(),
  files: z.record(z.string().min(1)).optional(),
  headers: z.record(z.string()).optional(),
  timeoutMs: z.number().int().positive().optional(),
  enabled: z.boolean().default(true)
});

const SourceSchema = z.discriminatedUnion("kind", [
  BaseSourceSchema.extend({
    kind: z.literal("pattern_match"),
    extraction: PatternMatchConfigSchema
  }),
  BaseSourceSchema.extend({
    kind: z.literal("structured_lookup"),
    extraction: StructuredLookupConfigSchema
  }),
  BaseSourceSchema.extend({
    kind: z.literal("listing_newest"),
    extraction: ListingNewestConfigSchema.default({})
  }),
  BaseSourceSchema.extend({
    kind: z.literal("header_derived"),
    extraction: HeaderDerivedConfigSchema
  })
]);

export const SourceRegistrySchema = z
  .object({
    version: z.string(),
    sources: z.array(SourceSchema)
  })
  .superRefine((registry, ctx) => {
    const seen = new Set<string>();
    registry.sources.forEach((source, index) => {
      if (seen.has(source.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sources", index, "id"],
          message: `Duplicate source id "${source.id}"`
        });
      }
      seen.add(source.id);

      const protocol = protocolOf(source.endpoint);
      if (protocol && !SUPPORTED_PROTOCOLS.some((supported) => supported === protocol)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sources", index, "endpoint"],
          message: `Unsupported protocol ${protocol}`
        });
      }
    });
  });

export type SourceRegistry = z.infer<typeof SourceRegistrySchema>;
export type SourceDefinition = z.infer<typeof SourceSchema>;
export type SourceKind = SourceDefinition["kind"];
export type ListingOrder = z.infer<typeof ListingOrderSchema>;

export type PatternMatchConfig = z.infer<typeof PatternMatchConfigSchema>;
export type StructuredLookupConfig = z.infer<typeof StructuredLookupConfigSchema>;
export type ListingNewestConfig = z.infer<typeof ListingNewestConfigSchema>;
export type HeaderDerivedConfig = z.infer<typeof HeaderDerivedConfigSchema>;
