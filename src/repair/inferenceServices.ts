import type { DiffRecord } from '../compare/architectureComparator';
import { RepairServiceError, SpecInterpretationError, errorMessage } from '../errors';
import { parseTreeJson, type TreeNode } from '../ir/treeModel';
import type { ChatClient } from './chatClient';
import { buildRepairMessages, buildSpecInterpreterMessages } from './prompts';

/** Free-text specification → expected hierarchy. */
export type SpecInterpreter = {
  interpret(specText: string): Promise<TreeNode>;
};

/**
 * One Diff Record + the implicated file's current text → full corrected file text, or undefined
 * when the service produced nothing usable.
 */
export type RepairService = {
  proposeFix(record: DiffRecord, filePath: string, content: string): Promise<string | undefined>;
};

const FENCED_BLOCK = /```[^\n]*\n([\s\S]*?)\n?```/;

/**
 * Remove markdown fencing around a model reply. When the reply holds a fenced block, its body is
 * returned; an unterminated opening fence line is dropped.
 */
export function stripCodeFences(reply: string): string {
  const text = reply.trim();
  const block = FENCED_BLOCK.exec(text);
  if (block) return block[1].trim();
  if (text.startsWith('```')) {
    const nl = text.indexOf('\n');
    return nl === -1 ? '' : text.slice(nl + 1).trim();
  }
  return text;
}

export function createInferenceSpecInterpreter(chat: ChatClient): SpecInterpreter {
  return {
    interpret: async (specText) => {
      let reply: string;
      try {
        reply = await chat.complete(buildSpecInterpreterMessages(specText));
      } catch (e) {
        throw new SpecInterpretationError(`Spec inference request failed: ${errorMessage(e)}`, { cause: e });
      }

      const body = stripCodeFences(reply);
      let doc: unknown;
      try {
        doc = JSON.parse(body);
      } catch (e) {
        throw new SpecInterpretationError(`Spec inference did not return valid JSON: ${errorMessage(e)}`, { cause: e });
      }

      const parsed = parseTreeJson(doc);
      if (!parsed.ok) {
        throw new SpecInterpretationError(`Spec inference returned a malformed hierarchy: ${parsed.error}`);
      }
      return parsed.tree;
    },
  };
}

export function createInferenceRepairService(chat: ChatClient): RepairService {
  return {
    proposeFix: async (record, filePath, content) => {
      let reply: string;
      try {
        reply = await chat.complete(buildRepairMessages(record, filePath, content));
      } catch (e) {
        throw new RepairServiceError(filePath, `Repair inference failed for ${filePath}: ${errorMessage(e)}`, {
          cause: e,
        });
      }
      const body = stripCodeFences(reply);
      return body === '' ? undefined : body + '\n';
    },
  };
}
