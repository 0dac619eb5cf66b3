import { err, ok, type Result } from "neverthrow";
import type { AppError } from "../../../core/entities/appError";
import type { ResourceKind } from "../../../core/entities/resource";
import type {
  RecordFetchRequest,
  RecordFetcherPort,
} from "../../../core/ports/outboundPorts";
import { HttpJsonClient, type HttpClientError } from "../../http/httpJsonClient";

type ResourcePath = {
  path: (symbol: string) => string;
  symbolInQuery: boolean;
};

const resourcePaths: Record<ResourceKind, ResourcePath> = {
  "balance-sheet-statement": {
    path: (symbol) => `/api/v3/balance-sheet-statement/${symbol}`,
    symbolInQuery: false,
  },
  "income-statement": {
    path: (symbol) => `/api/v3/income-statement/${symbol}`,
    symbolInQuery: false,
  },
  "cash-flow-statement": {
    path: (symbol) => `/api/v3/cash-flow-statement/${symbol}`,
    symbolInQuery: false,
  },
  profile: {
    path: (symbol) => `/api/v3/profile/${symbol}`,
    symbolInQuery: false,
  },
  quote: {
    path: (symbol) => `/api/v3/quote/${symbol}`,
    symbolInQuery: false,
  },
  "enterprise-values": {
    path: (symbol) => `/api/v3/enterprise-values/${symbol}`,
    symbolInQuery: false,
  },
  "historical-rating": {
    path: (symbol) => `/api/v3/historical-rating/${symbol}`,
    symbolInQuery: false,
  },
  "earning-call-transcript": {
    path: (symbol) => `/api/v4/batch_earning_call_transcript/${symbol}`,
    symbolInQuery: false,
  },
  "revenue-geographic-segmentation": {
    path: () => "/api/v4/revenue-geographic-segmentation",
    symbolInQuery: true,
  },
  "revenue-product-segmentation": {
    path: () => "/api/v4/revenue-product-segmentation",
    symbolInQuery: true,
  },
};

/**
 * Builds the request URL for one ticker and resource. The API key goes last.
 */
export const buildResourceUrl = (
  baseUrl: string,
  request: RecordFetchRequest,
): URL => {
  const { path, symbolInQuery } = resourcePaths[request.resource];
  const url = new URL(path(encodeURIComponent(request.symbol)), baseUrl);

  if (symbolInQuery) {
    url.searchParams.set("symbol", request.symbol);
  }

  for (const [name, value] of Object.entries(request.query ?? {})) {
    url.searchParams.set(name, value);
  }

  url.searchParams.set("apikey", request.apiKey);
  return url;
};

const authMessagePattern = /api key|apikey|invalid api call|unauthorized|authentication/i;

const readErrorMessage = (payload: unknown): string | null => {
  if (
    typeof payload !== "object" ||
    payload === null ||
    !("Error Message" in payload)
  ) {
    return null;
  }

  const message = payload["Error Message"];
  return typeof message === "string" && message.trim() ? message.trim() : null;
};

const parseBody = (body: string | undefined): unknown => {
  if (!body) {
    return null;
  }

  try {
    const parsed: unknown = JSON.parse(body);
    return parsed;
  } catch {
    return null;
  }
};

/**
 * Fetches raw Financial Modeling Prep payloads. Every failure becomes a
 * retrieval error naming the ticker and resource.
 */
export class FmpRecordFetcher implements RecordFetcherPort {
  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 10_000,
    private readonly retries = 0,
    private readonly retryDelayMs = 250,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async fetchRecords(
    request: RecordFetchRequest,
  ): Promise<Result<unknown, AppError>> {
    const url = buildResourceUrl(this.baseUrl, request);

    const response = await this.httpClient.getJson({
      url: url.toString(),
      timeoutMs: this.timeoutMs,
      retries: this.retries,
      retryDelayMs: this.retryDelayMs,
    });

    if (response.isErr()) {
      return err(this.toRetrievalError(request, response.error));
    }

    const providerMessage = readErrorMessage(response.value);
    if (providerMessage) {
      const isAuthError = authMessagePattern.test(providerMessage);
      return err({
        kind: "retrieval",
        code: isAuthError ? "auth_invalid" : "provider_error",
        message: `Financial Modeling Prep rejected ${request.resource} for ${request.symbol}: ${providerMessage}`,
        retryable: false,
        symbol: request.symbol,
        resource: request.resource,
      });
    }

    return ok(response.value);
  }

  private toRetrievalError(
    request: RecordFetchRequest,
    failure: HttpClientError,
  ): AppError {
    const base = {
      kind: "retrieval",
      retryable: failure.retryable,
      symbol: request.symbol,
      resource: request.resource,
      httpStatus: failure.httpStatus,
      cause: failure.cause ?? failure,
    } as const;
    const context = `${request.resource} for ${request.symbol}`;
    const status = failure.httpStatus;

    if (status === 401 || status === 403) {
      const detail = readErrorMessage(parseBody(failure.body));
      return {
        ...base,
        code: "auth_invalid",
        message: `Financial Modeling Prep auth failed with status ${status} fetching ${context}${detail ? `: ${detail}` : "."}`,
      };
    }

    if (status === 429) {
      return {
        ...base,
        code: "rate_limited",
        message: `Financial Modeling Prep rate limit reached fetching ${context}.`,
      };
    }

    if (failure.code === "timeout") {
      return {
        ...base,
        code: "timeout",
        message: `Timed out fetching ${context}: ${failure.message}`,
      };
    }

    if (failure.code === "invalid_json") {
      return {
        ...base,
        code: "invalid_json",
        message: `Response for ${context} was not valid JSON.`,
      };
    }

    if (failure.code === "non_success_status") {
      return {
        ...base,
        code: "provider_error",
        message: `Failed fetching ${context}: ${failure.message}`,
      };
    }

    return {
      ...base,
      code: "transport_error",
      message: `Failed fetching ${context}: ${failure.message}`,
    };
  }
}
