/**
 * Zod Schemas for the ticket desk bot
 *
 * Validates configuration at startup and inbound events at the router
 * boundary, so handlers only ever see well-formed input.
 */

import { z } from 'zod';

import { MAX_CATEGORIES } from '../constants.js';
import { SubjectKind } from '../core/entities/Ticket.js';

// ============================================================================
// Common Schemas
// ============================================================================

export const SnowflakeSchema = z.string()
  .regex(/^\d{17,20}$/, 'Must be a numeric Discord id (17-20 digits)')
  .describe('Discord snowflake id');

export const CategoryNameSchema = z.string()
  .trim()
  .min(1, 'Category name is required')
  .max(80, 'Category name must not exceed 80 characters')
  .regex(/^[^\s|]+$/, 'Category name must not contain whitespace or "|"')
  .describe('Category name, used in channel names and as counter key');

export const ActorSchema = z.object({
  id: SnowflakeSchema,
  roleIds: z.array(SnowflakeSchema).describe('Role ids held by the acting member')
});

export const SubjectKindSchema = z.nativeEnum(SubjectKind);

// ============================================================================
// Category File
// ============================================================================

export const CategorySchema = z.object({
  name: CategoryNameSchema,
  label: z.string().min(1).max(100).describe('Menu label'),
  description: z.string().max(100).default('').describe('Menu description'),
  emoji: z.string().min(1).optional().describe('Menu emoji'),
  supportRoleId: SnowflakeSchema.optional().describe('Support role override')
}).strict();

export const CategoryListSchema = z.array(CategorySchema)
  .min(1, 'At least one ticket category is required')
  .max(MAX_CATEGORIES, `At most ${MAX_CATEGORIES} ticket categories fit into the selection menu`)
  .superRefine((categories, ctx) => {
    const seen = new Set<string>();
    categories.forEach((category, index) => {
      if (seen.has(category.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate ticket category: ${category.name}`,
          path: [index, 'name']
        });
      }
      seen.add(category.name);
    });
  });

export type CategoryInput = z.infer<typeof CategorySchema>;

// ============================================================================
// Environment
// ============================================================================

const numberFromEnv = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const EnvironmentSchema = z.object({
  DISCORD_TOKEN: z.string().min(1, 'DISCORD_TOKEN is required'),
  GUILD_ID: SnowflakeSchema,
  DEFAULT_SUPPORT_ROLE_ID: SnowflakeSchema,
  OPEN_TICKETS_PARENT_ID: SnowflakeSchema,
  CLOSED_TICKETS_PARENT_ID: SnowflakeSchema,
  LOG_CHANNEL_ID: SnowflakeSchema,
  TICKET_CATEGORIES_PATH: z.string().min(1).default('config/categories.json'),

  MYSQL_HOST: z.string().min(1, 'MYSQL_HOST is required'),
  MYSQL_PORT: numberFromEnv(3306),
  MYSQL_DATABASE: z.string().min(1, 'MYSQL_DATABASE is required'),
  MYSQL_USER: z.string().min(1, 'MYSQL_USER is required'),
  MYSQL_PASSWORD: z.string().default(''),
  MYSQL_CONNECTION_LIMIT: numberFromEnv(10),

  ALLOCATOR_TIMEOUT_MS: numberFromEnv(5000),
  DELETE_GRACE_MS: numberFromEnv(5000),
  TIMEZONE: z.string().min(1).default('UTC'),
  ORGANIZATION_NAME: z.string().min(1).default('Support'),
  PORT: numberFromEnv(8000),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FILE: z.string().min(1).optional()
});

export type Environment = z.infer<typeof EnvironmentSchema>;

// ============================================================================
// Inbound Events
// ============================================================================

const TicketEventBase = {
  ticketId: SnowflakeSchema.describe('Channel id of the ticket'),
  actor: ActorSchema
};

export const InboundEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('send_panel'),
    channelId: SnowflakeSchema,
    actor: ActorSchema
  }),
  z.object({
    type: z.literal('create_ticket'),
    category: CategoryNameSchema,
    requesterId: SnowflakeSchema
  }),
  z.object({ type: z.literal('request_close'), ...TicketEventBase }),
  z.object({ type: z.literal('confirm_close'), ...TicketEventBase }),
  z.object({ type: z.literal('cancel_close'), ...TicketEventBase }),
  z.object({ type: z.literal('claim_ticket'), ...TicketEventBase }),
  z.object({
    type: z.literal('transfer_assignee'),
    ...TicketEventBase,
    targetId: SnowflakeSchema.describe('Member to become the assignee')
  }),
  z.object({ type: z.literal('reopen_ticket'), ...TicketEventBase }),
  z.object({ type: z.literal('delete_ticket'), ...TicketEventBase }),
  z.object({ type: z.literal('cancel_deletion'), ...TicketEventBase }),
  z.object({
    type: z.literal('add_participant'),
    ...TicketEventBase,
    subjectId: SnowflakeSchema,
    subjectKind: SubjectKindSchema
  }),
  z.object({
    type: z.literal('remove_participant'),
    ...TicketEventBase,
    subjectId: SnowflakeSchema,
    subjectKind: SubjectKindSchema
  })
]);

export type InboundEvent = z.infer<typeof InboundEventSchema>;
export type InboundEventType = InboundEvent['type'];

/**
 * Flatten zod issues into one line for logs and replies
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
