import { ROUTES, RouteContext } from '../../../src/infrastructure/discord/InteractionRouter.js';
import { buildCommandDefinitions } from '../../../src/infrastructure/discord/commands.js';
import { InboundEventSchema } from '../../../src/schemas/index.js';
import { CommandName, ControlId } from '../../../src/constants.js';
import { MEMBER_ID, STAFF_ID, TICKET_CHANNEL_ID, staff } from '../../helpers/fakes.js';

function context(overrides: { values?: string[]; options?: Record<string, string> } = {}): RouteContext {
  const options = overrides.options ?? {};
  return {
    actor: staff,
    channelId: TICKET_CHANNEL_ID,
    values: overrides.values ?? [],
    option: name => options[name]
  };
}

function build(key: string, routeContext: RouteContext = context()) {
  const route = ROUTES.get(key);
  if (!route) throw new Error(`No route for ${key}`);
  return route.build(routeContext);
}

describe('interaction routes', () => {
  it('should route every control and command', () => {
    const keys = [...Object.values(ControlId), ...Object.values(CommandName)];
    expect(keys.filter(key => !ROUTES.has(key))).toEqual([]);
  });

  it('should build valid events for every route', () => {
    const ctx = context({ values: ['General'], options: { user: MEMBER_ID, role: '200000000000000005' } });
    for (const [key, route] of ROUTES) {
      const parsed = InboundEventSchema.safeParse(route.build(ctx));
      expect({ key, valid: parsed.success }).toEqual({ key, valid: true });
    }
  });

  it('should open a ticket for the selected category', () => {
    expect(build(ControlId.TOPIC_SELECT, context({ values: ['Report'] }))).toEqual({
      type: 'create_ticket',
      category: 'Report',
      requesterId: STAFF_ID
    });
  });

  it('should map buttons to ticket events', () => {
    expect(build(ControlId.CLAIM)).toEqual({ type: 'claim_ticket', ticketId: TICKET_CHANNEL_ID, actor: staff });
    expect(build(ControlId.DELETE)).toEqual({ type: 'delete_ticket', ticketId: TICKET_CHANNEL_ID, actor: staff });
    expect(build(ControlId.CANCEL_DELETION)).toEqual({ type: 'cancel_deletion', ticketId: TICKET_CHANNEL_ID, actor: staff });
  });

  it('should use the close button and command for the same request', () => {
    expect(build(CommandName.CLOSE)).toEqual(build(ControlId.CLOSE_REQUEST));
  });

  it('should read members and roles from command options', () => {
    const ctx = context({ options: { user: MEMBER_ID, role: '200000000000000005' } });

    expect(build(CommandName.ADD, ctx)).toEqual({
      type: 'add_participant',
      ticketId: TICKET_CHANNEL_ID,
      actor: staff,
      subjectId: MEMBER_ID,
      subjectKind: 'member'
    });
    expect(build(CommandName.REMOVE_ROLE, ctx)).toEqual({
      type: 'remove_participant',
      ticketId: TICKET_CHANNEL_ID,
      actor: staff,
      subjectId: '200000000000000005',
      subjectKind: 'role'
    });
    expect(build(CommandName.ASSIGN, ctx)).toEqual({
      type: 'transfer_assignee',
      ticketId: TICKET_CHANNEL_ID,
      actor: staff,
      targetId: MEMBER_ID
    });
  });

  it('should answer the deletion countdown in public and confirmations in place', () => {
    expect(ROUTES.get(ControlId.DELETE)?.ack).toBe('public');
    expect(ROUTES.get(ControlId.CONFIRM_CLOSE)?.ack).toBe('update');
    expect(ROUTES.get(ControlId.CANCEL_CLOSE)?.ack).toBe('update');
    expect(ROUTES.get(ControlId.CLAIM)?.ack).toBe('ephemeral');
  });

  it('should leave events without a required option invalid', () => {
    expect(InboundEventSchema.safeParse(build(CommandName.ADD)).success).toBe(false);
  });
});

describe('command definitions', () => {
  it('should register every command name once', () => {
    const names = buildCommandDefinitions().map(command => command.name);
    expect(names).toEqual(['panel', 'close', 'add', 'remove', 'addrole', 'removerole', 'assign']);
  });

  it('should restrict the panel command to channel managers', () => {
    const panel = buildCommandDefinitions().find(command => command.name === CommandName.PANEL);
    expect(panel?.default_member_permissions).toBe('16');
  });
});
