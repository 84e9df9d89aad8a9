/**
 * Telegram Bot Shell
 *
 * Wires grammy to QuoteCommands: allow-list, user registration, command
 * routing and reply delivery. All reply text comes from the command layer;
 * this file only moves it between Telegram and QuoteCommands.
 */

import { Bot, InputFile, type Context, type PollingOptions } from "grammy";
import type { CommandReply, QuoteCommands } from "./commands/handlers.ts";
import type { MessageSender } from "./digest/jobs.ts";
import { fitMessage } from "./quotes/format.ts";
import type { QuoteStore } from "./quotes/store.ts";

export interface BotDeps {
  token: string;
  /** Updates from anyone else are dropped without a reply */
  allowedUserId: string;
  commands: QuoteCommands;
  store: Pick<QuoteStore, "registerUser">;
}

export const BOT_COMMANDS = [
  { command: "help", description: "How to save quotes and all commands" },
  { command: "random", description: "Get a random quote" },
  { command: "last", description: "Show recently saved quotes" },
  { command: "digest", description: "Get your digest now" },
  { command: "stats", description: "View your statistics" },
  { command: "search", description: "Search in quotes" },
  { command: "tag", description: "Find quotes by tag" },
  { command: "source", description: "Find quotes by source domain" },
  { command: "fav", description: "Toggle favorite" },
  { command: "favorites", description: "Show all favorites" },
  { command: "delete", description: "Delete a quote" },
  { command: "export", description: "Export all quotes as JSON" },
  { command: "settings", description: "Show delivery settings" },
  { command: "subscribe", description: "Turn on the digest or daily quote" },
  { command: "unsubscribe", description: "Turn off the digest or daily quote" },
];

/** Messages sent while the bot was offline are skipped, not replayed as saves */
export const POLLING_OPTIONS = { drop_pending_updates: true } satisfies PollingOptions;

// ============================================================
// MIDDLEWARE HELPERS
// ============================================================

export function isAuthorized(userId: string | undefined, allowedUserId: string): boolean {
  return userId !== undefined && userId === allowedUserId;
}

export interface TelegramUserInfo {
  id: string;
  username: string | null;
  displayName: string | null;
}

export function describeUser(from: {
  id: number;
  username?: string;
  first_name: string;
  last_name?: string;
}): TelegramUserInfo {
  const displayName = [from.first_name, from.last_name].filter(Boolean).join(" ").trim();
  return {
    id: from.id.toString(),
    username: from.username ?? null,
    displayName: displayName || null,
  };
}

/**
 * Registers each user once per process.
 */
export class UserRegistry {
  private readonly seen = new Set<string>();

  constructor(private readonly store: Pick<QuoteStore, "registerUser">) {}

  async ensure(user: TelegramUserInfo): Promise<void> {
    if (this.seen.has(user.id)) return;

    const created = await this.store.registerUser(user.id, user.username, user.displayName);
    this.seen.add(user.id);
    if (created) {
      console.log(`[Bot] Registered user ${user.id}`);
    }
  }
}

// ============================================================
// REPLIES
// ============================================================

async function sendReply(ctx: Context, reply: CommandReply): Promise<void> {
  if (typeof reply === "string") {
    await ctx.reply(fitMessage(reply));
    return;
  }

  const file = new InputFile(Buffer.from(reply.content, "utf-8"), reply.filename);
  await ctx.replyWithDocument(file, { caption: reply.caption });
}

export function createSender(bot: Bot): MessageSender {
  return {
    sendMessage: async (chatId, text) => {
      await bot.api.sendMessage(chatId, fitMessage(text));
    },
  };
}

// ============================================================
// BOT
// ============================================================

export function createBot(deps: BotDeps): Bot {
  const bot = new Bot(deps.token);
  const registry = new UserRegistry(deps.store);
  const { commands } = deps;

  // SECURITY: only the configured user
  bot.use(async (ctx, next) => {
    const userId = ctx.from?.id.toString();
    if (!isAuthorized(userId, deps.allowedUserId)) {
      console.log(`[Bot] Unauthorized: ${userId ?? "unknown"}`);
      return;
    }
    await next();
  });

  bot.use(async (ctx, next) => {
    if (ctx.from) {
      try {
        await registry.ensure(describeUser(ctx.from));
      } catch (error) {
        // Not marked as seen, so the next update retries
        console.error("[Bot] User registration failed:", error);
      }
    }
    await next();
  });

  const route = (
    command: string,
    handle: (userId: string, args: string) => CommandReply | Promise<CommandReply>
  ) => {
    bot.command(command, async (ctx) => {
      const userId = ctx.from?.id.toString();
      if (!userId) return;
      await sendReply(ctx, await handle(userId, ctx.match));
    });
  };

  route("start", () => commands.help());
  route("help", () => commands.help());
  route("stats", (userId) => commands.stats(userId));
  route("random", (userId) => commands.random(userId));
  route("last", (userId, args) => commands.last(userId, args));
  route("search", (userId, args) => commands.search(userId, args));
  route("tag", (userId, args) => commands.tag(userId, args));
  route("source", (userId, args) => commands.source(userId, args));
  route("fav", (userId, args) => commands.fav(userId, args));
  route("favorites", (userId) => commands.favorites(userId));
  route("delete", (userId, args) => commands.delete(userId, args));
  route("export", (userId) => commands.export(userId));
  route("digest", (userId) => commands.digest(userId));
  route("settings", (userId) => commands.settings(userId));
  route("subscribe", (userId, args) => commands.subscribe(userId, args));
  route("unsubscribe", (userId, args) => commands.unsubscribe(userId, args));

  bot.on("message:text", async (ctx) => {
    // Unknown commands are not quotes
    const userId = ctx.from?.id.toString();
    if (!userId || ctx.message.text.startsWith("/")) return;
    await sendReply(ctx, await commands.save(userId, ctx.message.text));
  });

  bot.catch((err) => {
    console.error(`[Bot] Error handling update ${err.ctx.update.update_id}:`, err.error);
  });

  return bot;
}
