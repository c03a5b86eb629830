import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

const ProvenanceSchema = z.enum(['cached', 'live', 'cached-stale', 'unavailable']);
const DecisionSchema = z.enum(['serve-cached', 'fetch-live-and-store', 'fetch-live-fallback-on-store-failure']);
const SentimentLabelSchema = z.enum(['positive', 'negative', 'neutral']);

export const GetPriceHistoryInputSchema = z.object({
  ticker: z.string().trim().min(1, 'ticker is required'),
  days: z.number().int().min(1).max(1000).default(30),
  endDate: z.string().trim().min(1).optional(),
  indicators: z.array(z.string()).optional(),
});

export const GetNewsInputSchema = z.object({
  ticker: z.string().trim().min(1).optional(),
  freshness: z.enum(['live', 'cached-only']).default('live'),
  limit: z.number().int().min(1).max(100).optional(),
  sentiment: SentimentLabelSchema.optional(),
});

export type GetPriceHistoryInput = z.infer<typeof GetPriceHistoryInputSchema>;
export type GetNewsInput = z.infer<typeof GetNewsInputSchema>;

const CompanySchema = z.object({
  ticker: z.string(),
  name: z.string(),
  aliases: z.array(z.string()),
  sector: z.string(),
  exclude: z.array(z.string()),
});

const PricePointSchema = z.object({
  ticker: z.string(),
  date: z.string(),
  open: z.number(),
  high: z.number(),
  low: z.number(),
  close: z.number(),
  adjClose: z.number().nullable(),
  volume: z.number(),
  changePct: z.number().nullable(),
  indicators: z.record(z.number().nullable()),
});

export const PriceHistoryResultSchema = z.object({
  ticker: z.string(),
  company: CompanySchema.nullable(),
  provenance: ProvenanceSchema,
  decision: DecisionSchema,
  persisted: z.boolean().nullable(),
  points: z.array(PricePointSchema),
  latestClose: z.number().nullable(),
  volatility: z.number().nullable(),
});

const NewsDocumentSchema = z.object({
  providerId: z.string(),
  publishedAt: z.string(),
  source: z.string(),
  url: z.string(),
  title: z.string(),
  summary: z.string(),
  tickers: z.array(z.string()),
  sentiment: z.object({
    score: z.number(),
    label: SentimentLabelSchema,
    method: z.string(),
    scoredAt: z.string(),
  }),
  ingestedAt: z.string(),
});

export const NewsResultSchema = z.object({
  ticker: z.string().nullable(),
  provenance: ProvenanceSchema,
  decision: DecisionSchema,
  persisted: z.boolean().nullable(),
  documents: z.array(NewsDocumentSchema),
  sentimentSummary: z.object({
    positive: z.number(),
    negative: z.number(),
    neutral: z.number(),
    averageScore: z.number().nullable(),
  }),
});

/** JSON Schema of an object, in the shape MCP tool listings take. */
export type ToolJsonSchema = {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toToolJsonSchema(schema: z.ZodTypeAny): ToolJsonSchema {
  const json: unknown = zodToJsonSchema(schema, { $refStrategy: 'none' });
  if (!isRecord(json) || json.type !== 'object' || !isRecord(json.properties)) {
    throw new Error('Tool schemas must describe an object');
  }
  const required = Array.isArray(json.required)
    ? json.required.filter((r): r is string => typeof r === 'string')
    : undefined;
  return { type: 'object', properties: json.properties, ...(required?.length ? { required } : {}) };
}

export const getPriceHistoryInputJsonSchema = toToolJsonSchema(GetPriceHistoryInputSchema);
export const getNewsInputJsonSchema = toToolJsonSchema(GetNewsInputSchema);
export const priceHistoryJsonSchema = toToolJsonSchema(PriceHistoryResultSchema);
export const newsJsonSchema = toToolJsonSchema(NewsResultSchema);
