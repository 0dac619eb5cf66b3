import { FundamentalsService } from "../services/fundamentalsService";
import { LabelStatementFormatter } from "../tables/statementFormatter";
import { env } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { FmpRecordFetcher } from "../../infra/providers/fmp/fmpRecordFetcher";

export type Runtime = {
  fundamentalsService: FundamentalsService;
};

/**
 * Composition root shared by every CLI command.
 */
export const createRuntime = (): Runtime => {
  const fetcher = new FmpRecordFetcher(
    env.FMP_BASE_URL,
    env.FMP_TIMEOUT_MS,
    env.FMP_RETRIES,
    env.FMP_RETRY_DELAY_MS,
  );

  return {
    fundamentalsService: new FundamentalsService(
      fetcher,
      new LabelStatementFormatter(),
      logger,
    ),
  };
};
