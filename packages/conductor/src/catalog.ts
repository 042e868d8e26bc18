import { readFileSync } from "node:fs";
import {
  ConfigurationError,
  MODEL_STRENGTHS,
  type ModelCatalog,
  type ModelDescriptor,
} from "@research-agent/shared";
import { z } from "zod";

const ModelDescriptorSchema = z.object({
  name: z.string().trim().min(1),
  strength: z.enum(MODEL_STRENGTHS),
  baselineLatencyMs: z.number().positive(),
  sizeGb: z.number().nonnegative().default(0),
  maxContext: z.number().int().positive().default(4096),
  qualityScore: z.number().min(0).max(10).default(5),
  specialties: z.array(z.string()).default([]),
});

const CatalogFileSchema = z.object({
  defaultComplexModel: z.string().trim().min(1).optional(),
  models: z.array(ModelDescriptorSchema),
});

export interface CatalogOptions {
  defaultComplexModel?: string;
}

/**
 * Lowest baseline latency; the earlier catalog entry wins a tie.
 */
export function fastestModel(catalog: Pick<ModelCatalog, "models">): ModelDescriptor {
  const [first, ...rest] = catalog.models;
  if (!first) throw new ConfigurationError("Model catalog is empty");
  return rest.reduce(
    (best, model) => (model.baselineLatencyMs < best.baselineLatencyMs ? model : best),
    first,
  );
}

export function findModel(catalog: ModelCatalog, name: string): ModelDescriptor | undefined {
  return catalog.models.find((model) => model.name === name);
}

function pickDefaultComplex(models: readonly ModelDescriptor[], fastest: ModelDescriptor): string {
  const others = models.filter((model) => model !== fastest);
  if (others.length === 0) return fastest.name;
  const writers = others.filter((model) => model.strength === "writing");
  return fastestModel({ models: writers.length > 0 ? writers : others }).name;
}

/**
 * Build an immutable catalog. Throws ConfigurationError when it is empty,
 * has duplicate names, or names a default complex model it cannot honour.
 */
export function createModelCatalog(
  models: readonly ModelDescriptor[],
  options: CatalogOptions = {},
): ModelCatalog {
  if (models.length === 0) {
    throw new ConfigurationError("Model catalog is empty");
  }

  const seen = new Set<string>();
  for (const model of models) {
    if (seen.has(model.name)) {
      throw new ConfigurationError(`Duplicate model in catalog: ${model.name}`);
    }
    seen.add(model.name);
  }

  const frozen = Object.freeze(
    models.map((model) =>
      Object.freeze({ ...model, specialties: Object.freeze([...model.specialties]) }),
    ),
  );
  const fastest = fastestModel({ models: frozen });

  let defaultComplexModel: string;
  if (options.defaultComplexModel !== undefined) {
    const named = frozen.find((model) => model.name === options.defaultComplexModel);
    if (!named) {
      throw new ConfigurationError(
        `Default complex model ${options.defaultComplexModel} is not in the catalog`,
      );
    }
    if (named === fastest && frozen.length > 1) {
      throw new ConfigurationError(
        `Default complex model ${named.name} is the fastest model; pick one of the slower models`,
      );
    }
    defaultComplexModel = named.name;
  } else {
    defaultComplexModel = pickDefaultComplex(frozen, fastest);
  }

  return Object.freeze({ models: frozen, defaultComplexModel });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "<root>"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate a catalog document (the parsed contents of config/models.json).
 * `options.defaultComplexModel` overrides the document's own default.
 */
export function parseModelCatalog(raw: unknown, options: CatalogOptions = {}): ModelCatalog {
  const parsed = CatalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Malformed model catalog: ${formatIssues(parsed.error)}`);
  }
  return createModelCatalog(parsed.data.models, {
    defaultComplexModel: options.defaultComplexModel ?? parsed.data.defaultComplexModel,
  });
}

export function loadModelCatalog(path: string, options: CatalogOptions = {}): ModelCatalog {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Cannot read model catalog at ${path}`, { cause: err });
  }
  return parseModelCatalog(raw, options);
}
