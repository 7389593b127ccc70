import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SERVER_NAME, SERVER_VERSION } from "./constants.js";
import type { PhenotypeSupportEngine } from "./engine/support-engine.js";
import {
  createErrorResponse,
  formatGeneQuery,
  formatGeneRanking,
  formatModuleRanking,
  formatModuleSummary,
  formatNextQuestion,
  formatPhenotypeListing,
  formatPredictions,
  formatQuerySummary,
  toolResponse,
  type ToolResponse,
} from "./format.js";
import { answerStates } from "./session/interactive-session.js";
import type { SessionStore } from "./session/session-store.js";
import { endRequestLog, errorRequestLog, startRequestLog } from "./telemetry.js";

const phenotypeList = (what: string) =>
  z
    .array(z.string())
    .optional()
    .default([])
    .describe(`${what} phenotypes, as HPO ids (HP:0000510) or names (Rod-cone dystrophy)`);

const moduleIdField = z.number().int().nonnegative().describe("Disease module id");

async function runTool(
  route: string,
  operation: string,
  handler: () => ToolResponse,
): Promise<ToolResponse> {
  const log = startRequestLog(route);
  try {
    const response = handler();
    endRequestLog(log);
    return response;
  } catch (error) {
    errorRequestLog(log, "tool.failed", error);
    return createErrorResponse(operation, error);
  }
}

export function buildServer(engine: PhenotypeSupportEngine, sessions: SessionStore): McpServer {
  const server = new McpServer(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.tool(
    "rank-modules",
    "Rank disease modules against observed and excluded phenotypes, with confidence and per-phenotype contributions",
    {
      observed: phenotypeList("Observed"),
      excluded: phenotypeList("Excluded"),
    },
    async ({ observed, excluded }) =>
      runTool("rank-modules", "ranking modules", () => {
        const resolved = engine.resolveQuery(observed, excluded);
        const matches = engine.rankModules(resolved.observed, resolved.excluded);
        return toolResponse(formatModuleRanking(matches), {
          matches,
          confidence: matches[0]?.confidence ?? 0,
          unmatchedInputs: resolved.unmatchedInputs,
          conflictingPhenotypes: resolved.conflictingPhenotypes,
        });
      }),
  );

  server.tool(
    "rank-genes",
    "Rank every gene of a module by support from the observed phenotypes plus a stability adjustment",
    {
      moduleId: moduleIdField,
      observed: phenotypeList("Observed"),
    },
    async ({ moduleId, observed }) =>
      runTool("rank-genes", "ranking genes", () => {
        const present = engine.resolvePhenotypes(observed);
        const genes = engine.rankGenes(moduleId, present.resolved);
        return toolResponse(formatGeneRanking(genes), {
          genes,
          unmatchedInputs: present.unmatched,
        });
      }),
  );

  server.tool(
    "predict-missing-phenotypes",
    "List phenotypes a module leads us to expect that have not been reported yet",
    {
      moduleId: moduleIdField,
      observed: phenotypeList("Observed"),
      excluded: phenotypeList("Excluded"),
      limit: z
        .number()
        .int()
        .min(1)
        .max(50)
        .optional()
        .describe("Number of predictions to return"),
    },
    async ({ moduleId, observed, excluded, limit }) =>
      runTool("predict-missing-phenotypes", "predicting phenotypes", () => {
        const resolved = engine.resolveQuery(observed, excluded);
        const predictions = engine.predictMissingPhenotypes(
          moduleId,
          resolved.observed,
          resolved.excluded,
          limit,
        );
        return toolResponse(formatPredictions(predictions), {
          predictions,
          unmatchedInputs: resolved.unmatchedInputs,
          conflictingPhenotypes: resolved.conflictingPhenotypes,
        });
      }),
  );

  server.tool(
    "suggest-next-question",
    "Pick the phenotype whose answer best separates the two leading modules",
    {
      observed: phenotypeList("Observed"),
      excluded: phenotypeList("Excluded"),
    },
    async ({ observed, excluded }) =>
      runTool("suggest-next-question", "suggesting a question", () => {
        const suggestion = engine.suggestNextPhenotype(observed, excluded);
        return toolResponse(formatNextQuestion(suggestion.nextQuestion), suggestion);
      }),
  );

  server.tool(
    "query-phenotypes",
    "Full query: module ranking, candidate genes, predicted phenotypes, next question and explanation",
    {
      observed: phenotypeList("Observed"),
      excluded: phenotypeList("Excluded"),
      topGenes: z.number().int().min(1).max(200).optional().default(20),
      topPredictions: z.number().int().min(1).max(50).optional().default(10),
    },
    async ({ observed, excluded, topGenes, topPredictions }) =>
      runTool("query-phenotypes", "querying phenotypes", () => {
        const result = engine.query({ observed, excluded, topGenes, topPredictions });
        return toolResponse(formatQuerySummary(result), result);
      }),
  );

  server.tool(
    "query-gene",
    "Look up a gene's module, stability class, module neighbours and characteristic phenotypes",
    {
      gene: z.string().describe("Gene symbol (case-sensitive, e.g. RPGR)"),
    },
    async ({ gene }) =>
      runTool("query-gene", "querying gene", () => {
        const result = engine.queryGene(gene);
        if (!result) {
          return toolResponse(`Gene not found: ${gene}`, { found: false, unmatchedInputs: [gene] });
        }
        return toolResponse(formatGeneQuery(result), { found: true, ...result });
      }),
  );

  server.tool(
    "module-summary",
    "Summarize a module: gene count, core genes and most characteristic phenotypes",
    {
      moduleId: moduleIdField,
    },
    async ({ moduleId }) =>
      runTool("module-summary", "summarizing module", () => {
        const summary = engine.moduleSummary(moduleId);
        return toolResponse(formatModuleSummary(summary), summary);
      }),
  );

  server.tool(
    "search-phenotypes",
    "Search known phenotypes by name or HPO id",
    {
      query: z.string().describe("Substring of a phenotype name or id"),
      limit: z.number().int().min(1).max(100).optional().default(20),
    },
    async ({ query, limit }) =>
      runTool("search-phenotypes", "searching phenotypes", () => {
        const entries = engine.provider.searchPhenotypes(query, limit);
        return toolResponse(formatPhenotypeListing(entries, query), { phenotypes: entries });
      }),
  );

  server.tool(
    "session-start",
    "Start an interactive yes/no/unknown question session",
    async () =>
      runTool("session-start", "starting session", () => {
        const { sessionId, session } = sessions.create();
        const nextQuestion = session.nextQuestion();
        return toolResponse(`Session ${sessionId}\n${formatNextQuestion(nextQuestion)}`, {
          sessionId,
          nextQuestion,
        });
      }),
  );

  server.tool(
    "session-answer",
    "Answer a phenotype question in an interactive session and get the next question",
    {
      sessionId: z.string().describe("Id returned by session-start"),
      phenotype: z.string().describe("HPO id or phenotype name"),
      answer: z.enum(answerStates),
    },
    async ({ sessionId, phenotype, answer }) =>
      runTool("session-answer", "recording answer", () => {
        const session = sessions.get(sessionId);
        if (!session) return createErrorResponse("recording answer", `unknown session ${sessionId}`);
        const resolution = session.answer(phenotype, answer);
        if (resolution.status === "unresolved") {
          return toolResponse(`Unmatched phenotype: ${phenotype}`, {
            recorded: false,
            unmatchedInputs: [phenotype],
          });
        }
        const nextQuestion = session.nextQuestion();
        return toolResponse(`${session.summary()}\n\n${formatNextQuestion(nextQuestion)}`, {
          recorded: true,
          hpoId: resolution.hpoId,
          bestModule: session.bestModule(),
          nextQuestion,
        });
      }),
  );

  server.tool(
    "session-status",
    "Current result of an interactive session",
    {
      sessionId: z.string().describe("Id returned by session-start"),
    },
    async ({ sessionId }) =>
      runTool("session-status", "reading session", () => {
        const session = sessions.get(sessionId);
        if (!session) return createErrorResponse("reading session", `unknown session ${sessionId}`);
        const result = session.currentResult();
        return toolResponse(`${session.summary()}\n\n${formatQuerySummary(result)}`, {
          history: session.history(),
          result,
        });
      }),
  );

  return server;
}
