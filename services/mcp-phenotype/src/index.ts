#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import cors from "cors";
import express, { type Request, type Response } from "express";
import { appConfig } from "./config.js";
import { DataProvider } from "./data/provider.js";
import { DEMO_SNAPSHOT_PATH, loadSnapshotFile } from "./data/snapshot.js";
import { PhenotypeSupportEngine } from "./engine/support-engine.js";
import { buildServer } from "./server.js";
import { SessionStore } from "./session/session-store.js";
import { configureTelemetry, logEvent } from "./telemetry.js";

// get arguments
function getArgValue(prefix: string): string | undefined {
  const arg = process.argv.find((a) => a.startsWith(prefix));
  if (!arg) return undefined;
  const [, value] = arg.split("=", 2);
  return value;
}

async function createEngine(): Promise<PhenotypeSupportEngine> {
  const snapshotPath = appConfig.data.snapshotPath ?? DEMO_SNAPSHOT_PATH;
  if (!appConfig.data.snapshotPath) {
    logEvent("warn", "snapshot.demo", {
      path: snapshotPath,
      note: "illustrative data only, set PHENO_SNAPSHOT_PATH for a real snapshot",
    });
  }
  const snapshot = await loadSnapshotFile(snapshotPath);
  const provider = DataProvider.fromSnapshot(snapshot, {
    thresholds: appConfig.stability,
    moduleCount: appConfig.data.moduleCount,
  });
  logEvent("info", "engine.ready", {
    modules: provider.moduleIds().length,
    genes: provider.geneCount(),
  });
  return new PhenotypeSupportEngine(provider, {
    scoring: appConfig.scoring,
    prediction: appConfig.prediction,
    cache: appConfig.cache,
  });
}

// stdio server
async function runStdio(engine: PhenotypeSupportEngine, sessions: SessionStore) {
  const server = buildServer(engine, sessions);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logEvent("info", "server.started", { transport: "stdio" });
}

// streamable-http server
async function runHttp(engine: PhenotypeSupportEngine, sessions: SessionStore) {
  const app = express();
  app.use(express.json({ limit: "2mb" }));
  app.use(cors());
  app.options("/mcp", cors());

  const host = appConfig.server.host;
  const port = Number(getArgValue("--port") ?? appConfig.server.port);

  app.all("/mcp", async (req: Request, res: Response) => {
    const server = buildServer(engine, sessions);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });

    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        logEvent("warn", "http.close_failed", { error: String(error) });
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logEvent("error", "http.request_failed", { error: String(error) });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  app.listen(port, host, () => {
    logEvent("info", "server.started", { transport: "http", url: `http://${host}:${port}/mcp` });
  });
}

// main
async function main() {
  configureTelemetry({ level: appConfig.logLevel });
  const engine = await createEngine();
  const sessions = new SessionStore(
    engine,
    appConfig.server.sessionTtlMs,
    appConfig.server.sessionMax,
  );

  const useHttp = process.argv.includes("--http");
  if (useHttp) return runHttp(engine, sessions);
  return runStdio(engine, sessions);
}

main().catch((error: unknown) => {
  logEvent("error", "server.fatal", { error: String(error) });
  process.exit(1);
});
