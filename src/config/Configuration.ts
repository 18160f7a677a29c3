import * as dotenv from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';

import { Category } from '../core/entities/Category.js';
import { CategoryListSchema, EnvironmentSchema, formatIssues } from '../schemas/index.js';
import { isValidTimeZone } from '../utils/time.js';
import { LogLevel } from '../infrastructure/logging/Logger.js';

export type EnvironmentSource = Readonly<Record<string, string | undefined>>;

/**
 * Application Configuration
 * Loads environment variables (.env in the working directory) and the
 * ticket category file, and validates both before anything connects.
 */
export class Configuration {
  // Discord
  public readonly discordToken: string;
  public readonly guildId: string;

  // Ticket layout
  public readonly defaultSupportRoleId: string;
  public readonly openTicketsParentId: string;
  public readonly closedTicketsParentId: string;
  public readonly logChannelId: string;
  public readonly categoriesPath: string;
  public readonly categories: readonly Category[];

  // Counter store
  public readonly mysql: {
    readonly host: string;
    readonly port: number;
    readonly database: string;
    readonly user: string;
    readonly password: string;
    readonly connectionLimit: number;
  };

  // Behaviour
  public readonly allocatorTimeoutMs: number;
  public readonly deleteGraceMs: number;
  public readonly timeZone: string;
  public readonly organizationName: string;
  public readonly port: number;

  // Logging
  public readonly logLevel: LogLevel;
  public readonly logFile: string | undefined;

  /**
   * @param env - variables to read; defaults to process.env after loading .env
   */
  constructor(env?: EnvironmentSource) {
    if (!env) {
      dotenv.config();
    }

    const parsed = EnvironmentSchema.safeParse(env ?? process.env);
    if (!parsed.success) {
      throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`);
    }
    const values = parsed.data;

    this.discordToken = values.DISCORD_TOKEN;
    this.guildId = values.GUILD_ID;

    this.defaultSupportRoleId = values.DEFAULT_SUPPORT_ROLE_ID;
    this.openTicketsParentId = values.OPEN_TICKETS_PARENT_ID;
    this.closedTicketsParentId = values.CLOSED_TICKETS_PARENT_ID;
    this.logChannelId = values.LOG_CHANNEL_ID;
    this.categoriesPath = resolve(process.cwd(), values.TICKET_CATEGORIES_PATH);
    this.categories = this.loadCategories(this.categoriesPath);

    this.mysql = {
      host: values.MYSQL_HOST,
      port: values.MYSQL_PORT,
      database: values.MYSQL_DATABASE,
      user: values.MYSQL_USER,
      password: values.MYSQL_PASSWORD,
      connectionLimit: values.MYSQL_CONNECTION_LIMIT
    };

    this.allocatorTimeoutMs = values.ALLOCATOR_TIMEOUT_MS;
    this.deleteGraceMs = values.DELETE_GRACE_MS;
    this.timeZone = values.TIMEZONE;
    this.organizationName = values.ORGANIZATION_NAME;
    this.port = values.PORT;

    this.logLevel = values.LOG_LEVEL;
    this.logFile = values.LOG_FILE;

    this.validate();
  }

  /**
   * Read and validate the category list
   */
  private loadCategories(path: string): Category[] {
    if (!existsSync(path)) {
      throw new Error(`Ticket category file not found: ${path}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Ticket category file is not valid JSON (${path}): ${reason}`);
    }

    const parsed = CategoryListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new Error(`Invalid ticket categories in ${path}: ${formatIssues(parsed.error)}`);
    }
    return parsed.data;
  }

  /**
   * Cross-field checks the schemas cannot express
   */
  private validate(): void {
    if (this.openTicketsParentId === this.closedTicketsParentId) {
      throw new Error('OPEN_TICKETS_PARENT_ID and CLOSED_TICKETS_PARENT_ID must be different categories');
    }

    if (!isValidTimeZone(this.timeZone)) {
      throw new Error(`Invalid TIMEZONE: ${this.timeZone}`);
    }
  }

  /**
   * Configuration lines without sensitive data
   */
  public summary(): string[] {
    return [
      `Guild: ${this.guildId}`,
      `Token: ${this.discordToken ? '***' + this.discordToken.slice(-4) : 'not set'}`,
      `Default Support Role: ${this.defaultSupportRoleId}`,
      `Open / Closed Areas: ${this.openTicketsParentId} / ${this.closedTicketsParentId}`,
      `Log Channel: ${this.logChannelId}`,
      `Categories: ${this.categories.map(c => c.name).join(', ')} (${this.categoriesPath})`,
      `MySQL: ${this.mysql.user}@${this.mysql.host}:${this.mysql.port}/${this.mysql.database} (pool ${this.mysql.connectionLimit})`,
      `Allocator Timeout: ${this.allocatorTimeoutMs}ms`,
      `Deletion Grace: ${this.deleteGraceMs}ms`,
      `Time Zone: ${this.timeZone}`,
      `Health Check Port: ${this.port}`,
      `Log Level: ${this.logLevel}${this.logFile ? ` (file: ${this.logFile})` : ''}`
    ];
  }

  /**
   * Log configuration (without sensitive data)
   */
  public logSummary(): void {
    console.log('[Config] Loaded configuration:');
    for (const line of this.summary()) {
      console.log(`  ${line}`);
    }
  }
}
