#!/usr/bin/env node
import "reflect-metadata";
import { container } from "tsyringe";
import { loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { IMergePipeline } from "./services/merge-pipeline.interface";
import { MergeRunStatus } from "./types/result.types";

async function main() {
  try {
    const config = loadConfig();
    setupDI(config);

    const mergePipeline = container.resolve<IMergePipeline>("IMergePipeline");

    const summary = await mergePipeline.run(config.baseDirectory, (message) => console.log(message));

    console.log("\nRun summary (JSON):");
    console.log(JSON.stringify(summary, null, 2));
    process.exitCode = summary.status === MergeRunStatus.ABORTED ? 1 : 0;
  } catch (error) {
    console.error("Fatal error:", error);
    process.exitCode = 1;
  }
}

void main();
