import { err, ok, type Result } from "neverthrow";

export type HttpGetRequest = {
  url: string;
  headers?: Record<string, string>;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  body?: string;
  retryable: boolean;
  cause?: unknown;
};

const bodySnippetLength = 500;

/**
 * Issues GET requests and parses their bodies as JSON.
 */
export class HttpJsonClient {
  /**
   * Retries only failures marked retryable, `retries` times at most, with linear backoff.
   */
  async getJson(
    request: HttpGetRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const maxAttempts = request.retries + 1;
    let attempt = 1;

    for (;;) {
      const response = await this.performRequest(request);
      if (response.isOk()) {
        return response;
      }

      if (!response.error.retryable || attempt >= maxAttempts) {
        return response;
      }

      await this.delay(request.retryDelayMs * attempt);
      attempt += 1;
    }
  }

  private async performRequest(
    request: HttpGetRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: "GET",
        headers: request.headers,
        signal: controller.signal,
      });
      const text = await response.text();

      if (!response.ok) {
        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          body: text.slice(0, bodySnippetLength),
          retryable: response.status === 429 || response.status >= 500,
        });
      }

      try {
        const parsed: unknown = JSON.parse(text);
        return ok(parsed);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          body: text.slice(0, bodySnippetLength),
          retryable: false,
          cause: jsonError,
        });
      }
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
