/**
 * Category Entity
 * A selectable inquiry topic; scopes the sequence counter and support role
 */
export interface Category {
  /** Stable name, used in channel names, topics and as counter key */
  readonly name: string;

  /** Menu label */
  readonly label: string;

  /** Menu description */
  readonly description: string;

  /** Menu icon (unicode emoji) */
  readonly emoji?: string;

  /** Support role override; falls back to the default support role */
  readonly supportRoleId?: string;
}
