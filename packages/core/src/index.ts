// @herald/core: entry point
export * from './config/config.defaults.js';
export * from './config/config.loader.js';
export * from './styles/category.styles.js';
export { MessageKit } from './messages/message.kit.js';
export type { ContainerOptions, MessageOptions, MessageField, MediaItem } from './messages/message.kit.js';
export * from './messages/message.payload.js';
export { Messenger, responseOperation } from './delivery/messenger.js';
export type { ResponseTarget, SendTarget, EditTarget, ResponseOperation } from './delivery/delivery.types.js';
export { checkPayload, checkPayloads } from './conformance/payload.checker.js';
export type { CheckConfig } from './conformance/payload.checker.js';
export { scanSource } from './conformance/source.scanner.js';
export type { ScanConfig } from './conformance/source.scanner.js';
export { lintProject, issueLocation, summarize } from './conformance/project.linter.js';
export { RULE_IDS, RULE_DESCRIPTIONS, isRuleId } from './conformance/rules.js';
export { ConventionViolationError } from './conformance/conformance.errors.js';
export { CommandRouter } from './commands/command.router.js';
export { UsageError, DuplicateCommandError } from './commands/command.types.js';
export type { CommandHandler, CommandInteraction, CommandContext } from './commands/command.types.js';
export { createLogger, describeError } from './logging/logger.js';
export type { Logger } from './logging/logger.js';
