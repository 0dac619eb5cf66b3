import { Command } from "commander";
import type { Result } from "neverthrow";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import type { AppError } from "../core/entities/appError";
import { statementKinds, type StatementKind } from "../core/entities/resource";
import type { ResourceTable } from "../core/entities/table";
import { appSymbols, env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { formatTable } from "./formatTable";

type CommonOptions = {
  ticker?: string[];
  apiKey: string;
};

const tickersFrom = (opts: CommonOptions): string[] =>
  opts.ticker && opts.ticker.length > 0 ? opts.ticker : appSymbols();

const parseInteger = (value: string): number => Number.parseInt(value, 10);

const isStatementKind = (value: string): value is StatementKind =>
  statementKinds.some((kind) => kind === value);

/**
 * Prints the table, or logs the failure and marks the process as failed.
 */
const report = (result: Result<ResourceTable, AppError>): void => {
  if (result.isErr()) {
    const { kind, code, symbol, resource, message } = result.error;
    logger.error({ kind, code, symbol, resource }, message);
    process.exitCode = 1;
    return;
  }

  console.log(formatTable(result.value));
};

const withCommonOptions = (command: Command): Command =>
  command
    .option("-t, --ticker <symbols...>", "Ticker symbols (defaults to APP_SYMBOLS)")
    .option("--api-key <key>", "Financial Modeling Prep API key", env.FMP_API_KEY);

export const buildCli = () => {
  const cli = new Command();
  cli
    .name("fundamentals")
    .description("Retrieve and normalize company fundamentals");

  withCommonOptions(cli.command("statements"))
    .description("Balance, income or cash-flow statements")
    .requiredOption(
      "-s, --statement <kind>",
      `Statement kind (${statementKinds.join(", ")})`,
    )
    .option("-q, --quarter", "Quarterly instead of annual periods")
    .option("-l, --limit <count>", "Number of periods", parseInteger, 100)
    .action(
      async (
        opts: CommonOptions & { statement: string; quarter?: boolean; limit: number },
      ) => {
        if (!isStatementKind(opts.statement)) {
          logger.error(
            { statement: opts.statement },
            `Statement must be one of ${statementKinds.join(", ")}.`,
          );
          process.exitCode = 1;
          return;
        }

        const runtime = createRuntime();
        report(
          await runtime.fundamentalsService.getFinancialStatements(
            tickersFrom(opts),
            {
              statement: opts.statement,
              apiKey: opts.apiKey,
              quarter: Boolean(opts.quarter),
              limit: opts.limit,
            },
          ),
        );
      },
    );

  withCommonOptions(cli.command("profile"))
    .description("Company profiles")
    .action(async (opts: CommonOptions) => {
      const runtime = createRuntime();
      report(
        await runtime.fundamentalsService.getProfile(tickersFrom(opts), {
          apiKey: opts.apiKey,
        }),
      );
    });

  withCommonOptions(cli.command("quote"))
    .description("Latest quotes")
    .action(async (opts: CommonOptions) => {
      const runtime = createRuntime();
      report(
        await runtime.fundamentalsService.getQuote(tickersFrom(opts), {
          apiKey: opts.apiKey,
        }),
      );
    });

  withCommonOptions(cli.command("enterprise"))
    .description("Enterprise values")
    .option("-q, --quarter", "Quarterly instead of annual periods")
    .option("-l, --limit <count>", "Number of periods", parseInteger, 100)
    .action(
      async (opts: CommonOptions & { quarter?: boolean; limit: number }) => {
        const runtime = createRuntime();
        report(
          await runtime.fundamentalsService.getEnterpriseValues(
            tickersFrom(opts),
            {
              apiKey: opts.apiKey,
              quarter: Boolean(opts.quarter),
              limit: opts.limit,
            },
          ),
        );
      },
    );

  withCommonOptions(cli.command("rating"))
    .description("Historical ratings")
    .option("-l, --limit <count>", "Number of ratings", parseInteger, 100)
    .action(async (opts: CommonOptions & { limit: number }) => {
      const runtime = createRuntime();
      report(
        await runtime.fundamentalsService.getRatings(tickersFrom(opts), {
          apiKey: opts.apiKey,
          limit: opts.limit,
        }),
      );
    });

  withCommonOptions(cli.command("transcripts"))
    .description("Earnings call transcripts")
    .option("-y, --year <year>", "Fiscal year", parseInteger, 2023)
    .action(async (opts: CommonOptions & { year: number }) => {
      const runtime = createRuntime();
      report(
        await runtime.fundamentalsService.getEarningsCallTranscripts(
          tickersFrom(opts),
          { apiKey: opts.apiKey, year: opts.year },
        ),
      );
    });

  withCommonOptions(cli.command("revenue-geo"))
    .description("Revenue by geographic segment")
    .option("--annual", "Annual instead of quarterly periods")
    .action(async (opts: CommonOptions & { annual?: boolean }) => {
      const runtime = createRuntime();
      report(
        await runtime.fundamentalsService.getRevenueByGeography(
          tickersFrom(opts),
          { apiKey: opts.apiKey, quarter: !opts.annual },
        ),
      );
    });

  withCommonOptions(cli.command("revenue-product"))
    .description("Revenue by product segment")
    .option("--annual", "Annual instead of quarterly periods")
    .action(async (opts: CommonOptions & { annual?: boolean }) => {
      const runtime = createRuntime();
      report(
        await runtime.fundamentalsService.getRevenueByProduct(
          tickersFrom(opts),
          { apiKey: opts.apiKey, quarter: !opts.annual },
        ),
      );
    });

  return cli;
};

export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
