import type { HeraldConfig } from '@herald/shared';
import { checkPayload } from '../conformance/payload.checker.js';
import { ConventionViolationError } from '../conformance/conformance.errors.js';
import { MessageKit } from '../messages/message.kit.js';
import {
  isEphemeral,
  toBasePayload,
  type BasePayload,
  type ReplyPayload,
} from '../messages/message.payload.js';
import { createLogger, type Logger } from '../logging/logger.js';
import type { EditTarget, ResponseOperation, ResponseTarget, SendTarget } from './delivery.types.js';

/** Picks the interaction call that can still deliver a message. */
export function responseOperation(target: Pick<ResponseTarget, 'replied' | 'deferred'>): ResponseOperation {
  if (target.replied) return 'followUp';
  if (target.deferred) return 'editReply';
  return 'reply';
}

/**
 * Sends Components V2 payloads through discord.js targets, checking each one
 * against the message convention first according to `delivery.enforce`.
 */
export class Messenger {
  readonly kit: MessageKit;

  constructor(
    readonly config: HeraldConfig,
    private readonly logger: Logger = createLogger('delivery', config.logs.level),
  ) {
    this.kit = new MessageKit(config);
  }

  async reply<T>(target: { reply(options: ReplyPayload): Promise<T> }, payload: ReplyPayload): Promise<T> {
    this.guard('reply', payload);
    return target.reply(payload);
  }

  async followUp<T>(target: { followUp(options: ReplyPayload): Promise<T> }, payload: ReplyPayload): Promise<T> {
    this.guard('followUp', payload);
    return target.followUp(payload);
  }

  /** Edits the original response; an ephemeral bit on `payload` is dropped. */
  async editReply<T>(
    target: { editReply(options: BasePayload): Promise<T> },
    payload: ReplyPayload | BasePayload,
  ): Promise<T> {
    const base = toBasePayload(payload);
    this.guard('editReply', base);
    return target.editReply(base);
  }

  async send<T>(channel: SendTarget<T>, payload: ReplyPayload | BasePayload): Promise<T> {
    if (isEphemeral(payload)) {
      throw new Error('Channel messages cannot be ephemeral; reply to an interaction instead');
    }
    const base = toBasePayload(payload);
    this.guard('send', base);
    return channel.send(base);
  }

  async edit<T>(message: EditTarget<T>, payload: ReplyPayload | BasePayload): Promise<T> {
    const base = toBasePayload(payload);
    this.guard('edit', base);
    return message.edit(base);
  }

  /**
   * Replies, edits the deferred reply, or follows up, whichever the
   * interaction's state allows.
   */
  async respond(target: ResponseTarget, payload: ReplyPayload): Promise<ResponseOperation> {
    const operation = responseOperation(target);
    switch (operation) {
      case 'reply':
        await this.reply(target, payload);
        break;
      case 'editReply':
        await this.editReply(target, payload);
        break;
      case 'followUp':
        await this.followUp(target, payload);
        break;
    }
    this.logger.debug(`responded with ${operation}`);
    return operation;
  }

  /**
   * Logs `error` and tells the user, ephemerally, that `context` failed.
   * The error's own message is not shown to the user.
   */
  async notifyFailure(target: ResponseTarget, error: unknown, context = 'Something went wrong'): Promise<void> {
    this.logger.error(context, error);
    try {
      await this.respond(target, this.kit.error(`${context}. Please try again later.`, { ephemeral: true }));
    } catch (deliveryError) {
      this.logger.error('Could not deliver failure notice', deliveryError);
      throw deliveryError;
    }
  }

  private guard(operation: string, payload: ReplyPayload | BasePayload): void {
    const mode = this.config.delivery.enforce;
    if (mode === 'off') return;

    const issues = checkPayload(payload, this.config);
    if (issues.length === 0) return;

    const errors = issues.filter((i) => i.severity === 'error');
    if (mode === 'throw' && errors.length > 0) {
      throw new ConventionViolationError(operation, errors);
    }
    for (const issue of issues) {
      this.logger.warn(`${operation}: ${issue.rule}: ${issue.message}`);
    }
  }
}
