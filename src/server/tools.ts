import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { StructuredLogger } from "../logger.js";
import type { PevOrchestrator, PevResult } from "../pev/orchestrator.js";
import { createRequestContext, type RequestContext, type RequestDefaults } from "../pev/request.js";
import {
  IngameQaInputSchema,
  IngameQaInputShape,
  PreGameAdviceInputSchema,
  PreGameAdviceInputShape,
} from "./schemas.js";
import { coachToolError } from "./toolErrors.js";

export const SERVER_NAME = "aram-pev-coach";
export const SERVER_VERSION = "0.1.0";

export interface CoachServerDependencies {
  readonly orchestrator: PevOrchestrator;
  readonly defaults: RequestDefaults;
  readonly logger: StructuredLogger;
}

function success(tool: string, result: PevResult) {
  return {
    content: [{ type: "text" as const, text: JSON.stringify({ tool, result }, null, 2) }],
    structuredContent: { ...result },
  };
}

/** Registers the coaching tools on a fresh MCP server. */
export function createCoachServer(deps: CoachServerDependencies): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  const { orchestrator, defaults, logger } = deps;

  const execute = async (
    tool: string,
    build: () => { request: RequestContext; maxAttempts: number | undefined },
    signal: AbortSignal,
  ) => {
    try {
      const { request, maxAttempts } = build();
      const result = await orchestrator.run(request, { maxAttempts, signal });
      logger.info(`${tool}_completed`, {
        patch: result.patch,
        attempts_used: result.attemptsUsed,
        degraded: result.degraded,
      });
      return success(tool, result);
    } catch (error) {
      return coachToolError(logger, tool, error);
    }
  };

  server.registerTool(
    "pre_game_advice",
    {
      title: "Pre-game advice",
      description: "Recommends a team role, a build plan and a short summary for an ARAM matchup.",
      inputSchema: PreGameAdviceInputShape,
    },
    async (input: unknown, extra) =>
      execute(
        "pre_game_advice",
        () => {
          const parsed = PreGameAdviceInputSchema.parse(input);
          return {
            request: createRequestContext(
              {
                mode: "pre_game",
                patch: parsed.patch,
                team: parsed.ally_comp,
                opponents: parsed.enemy_comp,
                question: parsed.question,
              },
              defaults,
            ),
            maxAttempts: parsed.max_attempts,
          };
        },
        extra.signal,
      ),
  );

  server.registerTool(
    "ingame_qa",
    {
      title: "In-game Q&A",
      description: "Answers a question asked mid-game from the point of view of the given champion.",
      inputSchema: IngameQaInputShape,
    },
    async (input: unknown, extra) =>
      execute(
        "ingame_qa",
        () => {
          const parsed = IngameQaInputSchema.parse(input);
          return {
            request: createRequestContext(
              {
                mode: "ingame_qa",
                patch: parsed.patch,
                team: parsed.ally_comp ?? [parsed.my_champ],
                opponents: parsed.enemy_comp ?? [],
                question: parsed.question,
                focus: parsed.my_champ,
              },
              defaults,
            ),
            maxAttempts: parsed.max_attempts,
          };
        },
        extra.signal,
      ),
  );

  return server;
}
