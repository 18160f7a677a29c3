import { Category } from '../entities/Category.js';
import { Actor } from '../entities/Ticket.js';

/**
 * Category Catalog
 * Configured inquiry categories and the support roles that serve them.
 *
 * Support status is decided only by this configured role set, never by
 * querying role metadata on the platform.
 */
export class CategoryCatalog {
  private readonly byName: ReadonlyMap<string, Category>;
  private readonly supportRoles: ReadonlySet<string>;

  constructor(
    private readonly categories: readonly Category[],
    private readonly defaultSupportRoleId: string
  ) {
    this.byName = new Map(categories.map(category => [category.name, category]));

    const roles = new Set<string>([defaultSupportRoleId]);
    for (const category of categories) {
      if (category.supportRoleId) roles.add(category.supportRoleId);
    }
    this.supportRoles = roles;
  }

  /**
   * All categories in menu order
   */
  list(): readonly Category[] {
    return this.categories;
  }

  /**
   * Exact lookup; category names are part of channel names and counter keys
   */
  find(name: string): Category | null {
    return this.byName.get(name) ?? null;
  }

  isValid(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Per-category override, or the default support role
   */
  resolveSupportRole(categoryName: string): string {
    return this.find(categoryName)?.supportRoleId ?? this.defaultSupportRoleId;
  }

  /**
   * Every configured support role id (default plus overrides)
   */
  supportRoleIds(): ReadonlySet<string> {
    return this.supportRoles;
  }

  isSupportRole(roleId: string): boolean {
    return this.supportRoles.has(roleId);
  }

  isSupport(actor: Actor): boolean {
    return actor.roleIds.some(roleId => this.supportRoles.has(roleId));
  }
}
