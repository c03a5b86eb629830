import { ErrorCode, McpError, type CallToolResult, type Tool } from '@modelcontextprotocol/sdk/types.js';
import type { z } from 'zod';
import { InvalidQueryError, MarketDataError, TickerNotFoundError } from './errors.js';
import { logger } from './logger.js';
import {
  GetNewsInputSchema,
  GetPriceHistoryInputSchema,
  NewsResultSchema,
  PriceHistoryResultSchema,
  getNewsInputJsonSchema,
  getPriceHistoryInputJsonSchema,
  newsJsonSchema,
  priceHistoryJsonSchema,
} from './schemas/marketData.js';
import { DEFAULT_INDICATORS, parseIndicator } from './services/indicators.js';
import type { MarketDataService } from './services/marketData.js';
import { summarizeNews, summarizePriceHistory } from './services/summaries.js';
import { parseDateNL } from './utils/date.js';

export const TOOLS: Tool[] = [
  {
    name: 'get_price_history',
    description:
      'Daily price history for a stock ticker with change %, moving averages (ma_<window>) and RSI (rsi_<window>). ' +
      'Served from the database when complete and recent, otherwise fetched live and stored.',
    inputSchema: getPriceHistoryInputJsonSchema,
    outputSchema: priceHistoryJsonSchema,
  },
  {
    name: 'get_news',
    description:
      'Recent financial news with sentiment for a ticker, or general market news when no ticker is given. ' +
      'freshness "cached-only" never calls the news provider.',
    inputSchema: getNewsInputJsonSchema,
    outputSchema: newsJsonSchema,
  },
];

function parseArguments<S extends z.ZodTypeAny>(schema: S, args: unknown): z.output<S> {
  const parsed = schema.safeParse(args ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.') || 'input'}: ${i.message}`).join('; ');
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments: ${detail}`);
  }
  return parsed.data;
}

/**
 * Map domain failures onto MCP error codes. Anything unexpected is logged first.
 */
export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) return error;
  if (error instanceof InvalidQueryError || error instanceof TickerNotFoundError) {
    return new McpError(ErrorCode.InvalidParams, error.message);
  }
  if (error instanceof MarketDataError) {
    logger.warn({ err: error }, 'Tool invocation failed');
    return new McpError(ErrorCode.InternalError, error.message);
  }
  logger.error({ err: error }, 'Unexpected tool invocation failure');
  return new McpError(ErrorCode.InternalError, error instanceof Error ? error.message : 'Unexpected error');
}

function resolveEndDate(input: string | undefined): string | undefined {
  if (!input) return undefined;
  try {
    return parseDateNL(input);
  } catch (err) {
    throw new InvalidQueryError(err instanceof Error ? err.message : `Invalid endDate: ${input}`);
  }
}

export async function handleToolCall(
  service: MarketDataService,
  name: string,
  args: unknown,
): Promise<CallToolResult> {
  try {
    switch (name) {
      case 'get_price_history': {
        const input = parseArguments(GetPriceHistoryInputSchema, args);
        const result = await service.getPriceHistory({
          ticker: input.ticker,
          days: input.days,
          endDate: resolveEndDate(input.endDate),
          indicators: input.indicators ? input.indicators.map(parseIndicator) : DEFAULT_INDICATORS,
        });
        const structured = PriceHistoryResultSchema.parse(result);
        return {
          content: [{ type: 'text', text: summarizePriceHistory(result) }],
          structuredContent: structured,
        };
      }
      case 'get_news': {
        const input = parseArguments(GetNewsInputSchema, args);
        const result = await service.getNews(input);
        const structured = NewsResultSchema.parse(result);
        return {
          content: [{ type: 'text', text: summarizeNews(result) }],
          structuredContent: structured,
        };
      }
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  } catch (error) {
    throw toMcpError(error);
  }
}
