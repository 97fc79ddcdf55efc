/**
 * slash-registry — src/dispatch/responder.ts
 * WHAT: Sends the response to one interaction.
 * FLOWS:
 *  - first reply/defer → POST interactions/{id}/{token}/callback
 *  - reply after that → POST webhooks/{app}/{token} (follow-up)
 *  - autocomplete → callback type 8 with up to 25 choices
 * DOCS:
 *  - Responding to an interaction: https://discord.com/developers/docs/interactions/receiving-and-responding#responding-to-an-interaction
 *  - Follow-up messages: https://discord.com/developers/docs/interactions/receiving-and-responding#create-followup-message
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { InteractionResponseType, MessageFlags, type REST, Routes } from "discord.js";
import { LIMITS } from "../lib/validation.js";
import type { ChoiceWire } from "../commands/types.js";
import type { InvocationPayload } from "./payload.js";

export interface ReplyOptions {
  content: string;
  ephemeral?: boolean;
}

export interface InteractionResponder {
  /** True once a reply or defer went out. */
  readonly acknowledged: boolean;
  reply(options: ReplyOptions | string): Promise<void>;
  defer(options?: { ephemeral?: boolean }): Promise<void>;
  autocomplete(choices: readonly ChoiceWire[]): Promise<void>;
}

function messageBody(options: ReplyOptions | string): { content: string; flags?: number } {
  const normalized = typeof options === "string" ? { content: options } : options;
  return normalized.ephemeral
    ? { content: normalized.content, flags: MessageFlags.Ephemeral }
    : { content: normalized.content };
}

export class RestInteractionResponder implements InteractionResponder {
  private replied = false;

  constructor(
    private readonly rest: REST,
    private readonly payload: Pick<InvocationPayload, "id" | "token" | "application_id">
  ) {}

  get acknowledged(): boolean {
    return this.replied;
  }

  async reply(options: ReplyOptions | string): Promise<void> {
    const data = messageBody(options);
    if (this.replied) {
      await this.rest.post(Routes.webhook(this.payload.application_id, this.payload.token), {
        body: data,
        auth: false,
      });
      return;
    }
    await this.callback({ type: InteractionResponseType.ChannelMessageWithSource, data });
    this.replied = true;
  }

  async defer(options: { ephemeral?: boolean } = {}): Promise<void> {
    if (this.replied) return;
    await this.callback({
      type: InteractionResponseType.DeferredChannelMessageWithSource,
      data: options.ephemeral ? { flags: MessageFlags.Ephemeral } : {},
    });
    this.replied = true;
  }

  async autocomplete(choices: readonly ChoiceWire[]): Promise<void> {
    if (this.replied) return;
    await this.callback({
      type: InteractionResponseType.ApplicationCommandAutocompleteResult,
      data: { choices: choices.slice(0, LIMITS.CHOICES_MAX) },
    });
    this.replied = true;
  }

  private async callback(body: { type: InteractionResponseType; data: object }): Promise<void> {
    await this.rest.post(Routes.interactionCallback(this.payload.id, this.payload.token), {
      body,
      auth: false,
    });
  }
}
