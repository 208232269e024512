#!/usr/bin/env node
/**
 * Seed the demo store
 *
 * Usage:
 *   npm run seed -- [--reset] [--seed <n>]
 */

import { logger } from "@salesiq/core";
import { generateSeedData, getPool, resetPool, seedDatabase } from "../src/index.js";

function parseSeedArgs(argv: string[]): { reset: boolean; seed?: number } {
  const result: { reset: boolean; seed?: number } = { reset: false };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--reset" || arg === "--delete") {
      result.reset = true;
    } else if (arg === "--seed") {
      const value = Number(argv[++i]);
      if (!Number.isInteger(value)) {
        throw new Error("--seed expects an integer");
      }
      result.seed = value;
    }
  }

  return result;
}

async function main(): Promise<void> {
  const args = parseSeedArgs(process.argv.slice(2));
  const data = generateSeedData({ seed: args.seed });

  const client = await getPool().connect();
  try {
    await seedDatabase(client, data, { reset: args.reset });
    logger.info("Database seeded successfully");
    logger.info(
      `Campaign ${data.anomaly.campaignId} CTR drops from ${data.anomaly.startDate}; ` +
        `investigate with -c timeframe=${data.anomaly.startDate}`
    );
  } finally {
    client.release();
    await resetPool();
  }
}

main().catch((error: unknown) => {
  logger.error("Seeding failed", error);
  process.exitCode = 1;
});
