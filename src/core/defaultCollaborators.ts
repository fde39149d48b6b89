import type { RepairConfig } from '../config/repairConfig';
import { createOpenAIChatClient, type ChatClient } from '../repair/chatClient';
import {
  createCommandElaborationTool,
  createCommandValidationHarness,
  type ElaborationTool,
  type ValidationHarness,
} from '../repair/commandTools';
import {
  createInferenceRepairService,
  createInferenceSpecInterpreter,
  type RepairService,
  type SpecInterpreter,
} from '../repair/inferenceServices';

export type RepairCollaborators = {
  interpreter: SpecInterpreter;
  elaborator: ElaborationTool;
  repairer: RepairService;
  harness: ValidationHarness;
};

/**
 * Shell commands for elaboration and validation, one OpenAI-compatible chat client shared by
 * both inference services. `chat` replaces the network client (tests, other providers).
 */
export function createDefaultCollaborators(config: RepairConfig, chat?: ChatClient): RepairCollaborators {
  const client =
    chat ??
    createOpenAIChatClient({
      apiKey: config.inferenceApiKey,
      model: config.model,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
    });

  return {
    interpreter: createInferenceSpecInterpreter(client),
    repairer: createInferenceRepairService(client),
    elaborator: createCommandElaborationTool({
      command: config.elaborateCommand,
      cwd: config.workDir,
      xmlPath: config.elaboratedXmlPath,
      timeoutMs: config.timeoutMs,
    }),
    harness: createCommandValidationHarness({
      command: config.validateCommand,
      cwd: config.workDir,
      logPath: config.logPath,
      timeoutMs: config.timeoutMs,
      passMarkers: config.passMarkers,
    }),
  };
}
