#!/usr/bin/env node

/**
 * Ticket Desk Bot
 *
 * Support tickets on Discord: a category menu opens a private channel per
 * request, staff claim, close, reopen and delete tickets, and deleted tickets
 * are archived as HTML transcripts in a log channel.
 */

import { Client, Events, GatewayIntentBits } from 'discord.js';

// Configuration
import { Configuration } from './config/Configuration.js';

// Core
import { CategoryCatalog } from './core/services/CategoryCatalog.js';
import { PermissionMapper } from './core/services/PermissionMapper.js';
import { TicketStateMachine } from './core/services/TicketStateMachine.js';
import { SequenceAllocator } from './core/services/SequenceAllocator.js';
import { TranscriptComposer } from './core/services/TranscriptComposer.js';
import { TicketLock } from './core/services/TicketLock.js';
import { DeletionCountdown } from './core/services/DeletionCountdown.js';
import { TicketService } from './core/services/TicketService.js';

// Application
import { TicketHandlers } from './application/handlers/TicketHandlers.js';

// Infrastructure
import { Logger } from './infrastructure/logging/Logger.js';
import { CircuitBreaker } from './infrastructure/database/CircuitBreaker.js';
import { DatabaseConnectionManager } from './infrastructure/database/DatabaseConnectionManager.js';
import { MySQLCounterRepository } from './infrastructure/database/MySQLCounterRepository.js';
import { HttpMediaResolver } from './infrastructure/http/HttpMediaResolver.js';
import { HealthCheckServer } from './infrastructure/http/HealthCheckServer.js';
import { DiscordTicketGateway } from './infrastructure/discord/DiscordTicketGateway.js';
import { MessageFactory } from './infrastructure/discord/MessageFactory.js';
import { InteractionRouter } from './infrastructure/discord/InteractionRouter.js';
import { buildCommandDefinitions } from './infrastructure/discord/commands.js';

import { loadTranscriptStylesheet } from './utils/assets.js';
import { ADMIN_PANEL_TITLE, BOT_NAME, BOT_VERSION } from './constants.js';

// ============================================================================
// Setup
// ============================================================================

const config = new Configuration();
const logger = new Logger(config.logLevel, config.logFile);

const db = new DatabaseConnectionManager(
  config.mysql,
  logger.child('DB'),
  new CircuitBreaker({ logger: logger.child('Circuit') })
);
const counters = new MySQLCounterRepository(db);

const catalog = new CategoryCatalog(config.categories, config.defaultSupportRoleId);
const countdown = new DeletionCountdown(config.deleteGraceMs);

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    // Transcripts need message text
    GatewayIntentBits.MessageContent
  ]
});

const messages = new MessageFactory(catalog, config.organizationName);
const gateway = new DiscordTicketGateway(
  client,
  catalog,
  messages,
  {
    guildId: config.guildId,
    openParentId: config.openTicketsParentId,
    closedParentId: config.closedTicketsParentId,
    logChannelId: config.logChannelId
  },
  logger.child('Discord')
);

const tickets = new TicketService(
  gateway,
  new SequenceAllocator(counters, config.allocatorTimeoutMs),
  // The guild's @everyone role shares the guild id
  new TicketStateMachine(catalog, new PermissionMapper(), config.guildId),
  catalog,
  new TranscriptComposer(new HttpMediaResolver(logger.child('Media')), {
    timeZone: config.timeZone,
    adminPanelTitle: ADMIN_PANEL_TITLE,
    stylesheet: loadTranscriptStylesheet()
  }),
  new TicketLock(),
  countdown,
  logger.child('Tickets')
);

const router = new InteractionRouter(
  new TicketHandlers(tickets, catalog, logger.child('Handlers')),
  messages,
  logger.child('Router')
);

const health = new HealthCheckServer(config.port, logger.child('Health'));

// ============================================================================
// Events
// ============================================================================

client.once(Events.ClientReady, readyClient => {
  logger.info(`✓ Logged in as ${readyClient.user.tag}`);

  readyClient.guilds.fetch(config.guildId)
    .then(guild => guild.commands.set(buildCommandDefinitions()))
    .then(registered => logger.info(`✓ Registered ${registered.size} slash commands`))
    .catch(error => logger.error('Failed to register slash commands', error));
});

client.on(Events.InteractionCreate, interaction => {
  router.handle(interaction).catch(error => logger.error('Interaction handling failed', error));
});

client.on(Events.Error, error => {
  logger.error('Discord client error', error);
});

// ============================================================================
// Startup
// ============================================================================

async function main(): Promise<void> {
  logger.info(`Starting ${BOT_NAME} v${BOT_VERSION}...`);
  config.logSummary();

  await db.connect();
  await counters.ensureSchema();
  logger.info('✓ Counter store ready');

  await health.start();
  await client.login(config.discordToken);
}

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info(`Received ${signal}, shutting down...`);

  const cancelled = countdown.cancelAll();
  if (cancelled > 0) {
    logger.info(`Cancelled ${cancelled} pending ticket deletion(s)`);
  }

  await client.destroy();
  await health.stop();
  logger.info('Database statistics', db.getStats());
  await db.disconnect();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('Error during shutdown', error);
        process.exit(1);
      });
  });
}

main().catch((error) => {
  logger.error('Failed to start bot', error);
  process.exit(1);
});
