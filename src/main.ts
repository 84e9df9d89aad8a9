/**
 * Quote Keeper
 *
 * Entry point: load config, connect to Supabase, start the bot and the
 * digest scheduler. Run: tsx src/main.ts
 */

import "dotenv/config";
import { createClient, type SupabaseClient } from "@supabase/supabase-js";
import { BOT_COMMANDS, POLLING_OPTIONS, createBot, createSender } from "./bot.ts";
import { QuoteCommands } from "./commands/handlers.ts";
import { ConfigError, loadConfig, type Config } from "./config.ts";
import { DigestScheduler, buildDigestJobs } from "./digest/index.ts";
import { fetchMetadata } from "./metadata/index.ts";
import {
  QuoteStore,
  checkSchema,
  isSchemaComplete,
  missingColumnStatements,
  missingFunctionMigrations,
} from "./quotes/index.ts";

function readConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Startup schema check. Only warns: the bot still starts so that commands
 * the current schema supports keep working.
 */
async function warnOnSchemaDrift(supabase: SupabaseClient): Promise<void> {
  try {
    const status = await checkSchema(supabase);
    if (isSchemaComplete(status)) return;

    console.warn("[Schema] Database schema is incomplete. Run: npm run check-schema");
    for (const statement of missingColumnStatements(status)) {
      console.warn(`[Schema]   ${statement}`);
    }
    for (const migration of missingFunctionMigrations(status)) {
      console.warn(`[Schema]   apply ${migration}`);
    }
  } catch (error) {
    console.warn("[Schema] Schema check failed:", error);
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const supabase = createClient(config.supabase.url, config.supabase.key);

  await warnOnSchemaDrift(supabase);

  const store = new QuoteStore(supabase);
  const ownerId = config.telegram.allowedUserId;
  if (!(await store.getUser(ownerId))) {
    await store.registerUser(ownerId);
  }

  const commands = new QuoteCommands({
    store,
    fetchMetadata: (url) => fetchMetadata(url, { timeoutMs: config.metadataTimeoutMs }),
    schedule: config,
  });
  const bot = createBot({ token: config.telegram.botToken, allowedUserId: ownerId, commands, store });

  const scheduler = new DigestScheduler({ timezone: config.timezone });
  const jobs = buildDigestJobs(config, {
    store,
    sender: createSender(bot),
    digestCount: config.digest.count,
  });
  for (const job of jobs) {
    scheduler.register(job.id, job.pattern, job.run);
  }

  const shutdown = async (signal: string) => {
    console.log(`[Main] ${signal} received, shutting down`);
    scheduler.stop();
    await bot.stop();
    process.exit(0);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        console.error("[Main] Shutdown failed:", error);
        process.exit(1);
      });
    });
  }

  process.on("unhandledRejection", (reason) => {
    console.error("[Main] Unhandled rejection:", reason);
  });

  await bot.start({
    ...POLLING_OPTIONS,
    onStart: async (me) => {
      console.log(`[Bot] Running as @${me.username}`);

      try {
        await bot.api.setMyCommands(BOT_COMMANDS);
      } catch (error) {
        console.warn("[Bot] Could not publish the command list:", error);
      }

      scheduler.start();
      for (const job of scheduler.listJobs()) {
        console.log(`[DigestScheduler] ${job.id}: next run ${job.nextRun?.toISOString() ?? "never"}`);
      }
    },
  });
}

main().catch((error) => {
  console.error("[Main] Fatal:", error);
  process.exit(1);
});
