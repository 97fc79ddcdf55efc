/**
 * slash-registry — src/dispatch/payload.ts
 * WHAT: The part of an interaction-create event the dispatch engine reads, plus the
 *       resolved-entity shapes option values are mapped onto.
 * DOCS:
 *  - Interaction object: https://discord.com/developers/docs/interactions/receiving-and-responding#interaction-object
 *  - Resolved data: https://discord.com/developers/docs/interactions/receiving-and-responding#interaction-object-resolved-data-structure
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export interface ResolvedUser {
  id: string;
  username: string;
  global_name?: string | null;
  discriminator?: string;
  avatar?: string | null;
  bot?: boolean;
}

/** Members arrive without `user`; resolution attaches it from the user bundle when present. */
export interface ResolvedMember {
  nick?: string | null;
  roles: string[];
  joined_at: string;
  permissions?: string;
  avatar?: string | null;
  user?: ResolvedUser;
}

export interface ResolvedRole {
  id: string;
  name: string;
  color?: number;
  position?: number;
  permissions?: string;
  managed?: boolean;
  mentionable?: boolean;
}

export interface ResolvedChannel {
  id: string;
  type: number;
  name?: string | null;
  permissions?: string;
  parent_id?: string | null;
}

export interface ResolvedAttachment {
  id: string;
  filename: string;
  size: number;
  url: string;
  proxy_url?: string;
  content_type?: string;
}

export interface ResolvedMessage {
  id: string;
  channel_id: string;
  content: string;
  author?: ResolvedUser;
}

export interface ResolvedBundle {
  users?: Record<string, ResolvedUser>;
  members?: Record<string, ResolvedMember>;
  roles?: Record<string, ResolvedRole>;
  channels?: Record<string, ResolvedChannel>;
  attachments?: Record<string, ResolvedAttachment>;
  messages?: Record<string, ResolvedMessage>;
}

export type ResolvedValue =
  | string
  | number
  | boolean
  | ResolvedUser
  | ResolvedMember
  | ResolvedRole
  | ResolvedChannel
  | ResolvedAttachment
  | ResolvedMessage;

/** One layer of `data.options`: a sub-command, a group or a supplied value. */
export interface InvocationOption {
  name: string;
  type: number;
  value?: string | number | boolean;
  focused?: boolean;
  options?: InvocationOption[];
}

export interface InvocationData {
  id: string;
  name: string;
  type: number;
  guild_id?: string;
  target_id?: string;
  options?: InvocationOption[];
  resolved?: ResolvedBundle;
}

export interface InvocationPayload {
  id: string;
  application_id: string;
  type: number;
  token: string;
  guild_id?: string;
  channel_id?: string;
  locale?: string;
  member?: ResolvedMember & { user: ResolvedUser };
  user?: ResolvedUser;
  data: InvocationData;
}
