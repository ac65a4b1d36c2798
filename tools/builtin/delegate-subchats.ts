/**
 * Tool: delegate_subchats
 *
 * Splits work into independent child conversations, one per task, all running under the same
 * control profile. The calling conversation waits and receives the children's values as a
 * JSON array in task order.
 */

import { z } from 'zod';
import { toolResult, waitForChildren, type ToolDefinition, type ToolReply } from '../../core/contracts/tools';

export const DELEGATE_SUBCHATS_TOOL = 'delegate_subchats';

/** Upper bound on children per call; a group shares one deadline. */
export const MAX_SUBCHATS_PER_CALL = 20;

const argsSchema = z.object({
  tasks: z.array(z.string().trim().min(1)).min(1).max(MAX_SUBCHATS_PER_CALL),
  profile: z.string().trim().min(1)
});

export function createDelegateSubchatsTool(options: { defaultProfile?: string } = {}): ToolDefinition {
  return {
    name: DELEGATE_SUBCHATS_TOOL,
    description: 'Run each task in its own subchat and return all results together.',
    handler: (args): ToolReply => {
      const parsed = argsSchema.safeParse({ ...args, profile: args.profile ?? options.defaultProfile });
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        return toolResult(`Error: ${issue ? `${issue.path.join('.') || 'arguments'}: ${issue.message}` : 'invalid arguments'}`);
      }
      return waitForChildren(parsed.data.tasks.map((task) => ({ content: task, profile: parsed.data.profile })));
    }
  };
}
