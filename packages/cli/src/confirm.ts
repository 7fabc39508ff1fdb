import { UserCancelledError } from '@dshop/core';
import type { CommandContext } from './context.js';

/**
 * Gate for destructive commands. Passes when --yes was given or the user
 * agrees; otherwise records the cancellation and throws before anything
 * is touched.
 */
export async function confirmDestructive(
  ctx: CommandContext,
  question: string,
  operation: string,
  yes: boolean | undefined,
): Promise<void> {
  if (yes) return;

  if (!ctx.canPrompt) {
    ctx.audit.cancelled(operation);
    throw new UserCancelledError(`${operation} needs confirmation; pass --yes to skip the prompt`);
  }

  if (!(await ctx.prompter.confirm(question, false))) {
    ctx.audit.cancelled(operation);
    throw new UserCancelledError();
  }
}
