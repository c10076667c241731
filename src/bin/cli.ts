#!/usr/bin/env node
import { Command, Option } from "commander";
import path from "path";
import fs from "fs";
import YAML from "yaml";
import { SysTrackConfig } from "../types/schemas";
import { ConfigError, describeError } from "../types/errors";
import { configJsonSchema, defaultConfig, loadConfig, parseConfigFile } from "../config/settings";
import { ErrorHandler, toErrorLevel } from "../logging/error-handler";
import { createOrchestrator } from "../core/orchestrator";
import { formatPingResult, formatThroughput } from "../reports/formatter";

interface ConfigOptions {
  config?: string;
}

interface ReportOptions extends ConfigOptions {
  summary?: boolean;
  detailed?: boolean;
  json?: boolean;
  output?: string;
  host?: string;
}

interface PingOptions extends ConfigOptions {
  speedtest?: boolean;
}

interface ServeOptions extends ConfigOptions {
  port?: string;
  bind?: string;
}

const program = new Command();

function readConfig(configPath?: string): SysTrackConfig {
  try {
    return loadConfig({ configPath });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      error.issues.forEach(issue => console.error(`- ${issue}`));
      process.exit(1);
    }
    throw error;
  }
}

function setup(opts: ConfigOptions) {
  const cfg = readConfig(opts.config);
  const logger = new ErrorHandler(toErrorLevel(cfg.logging.level));
  return { cfg, logger, orchestrator: createOrchestrator(cfg, logger) };
}

program
  .name("systrack")
  .description("SysTrack - System Diagnostic and Reporting Tool")
  .version("1.0.0");

program
  .command("report")
  .description("Collect host and network diagnostics and save a report")
  .addOption(new Option("--summary", "Generate a summary report").conflicts("detailed"))
  .addOption(new Option("--detailed", "Generate a detailed report").conflicts("summary"))
  .option("--json", "Export report as JSON instead of text", false)
  .option("--output <dir>", "Output directory for reports")
  .option("--host <host>", "Host to ping for network diagnostics")
  .option("-c, --config <path>", "Path to config file")
  .addHelpText("after", `
Examples:
  systrack report --summary
  systrack report --detailed
  systrack report --summary --json
  systrack report --detailed --output reports/`)
  .action(async (opts: ReportOptions) => {
    if (!opts.summary && !opts.detailed) {
      program.error("error: one of --summary or --detailed is required");
    }
    const { cfg, orchestrator } = setup(opts);
    const mode = opts.detailed ? "detailed" : "summary";
    const format = opts.json || cfg.reports.format === "json" ? "json" : "text";

    console.log("Collecting system information...");
    console.log(`Checking network connectivity (${opts.host ?? cfg.network.host})...`);
    const run = await orchestrator.runReport(mode, {
      host: opts.host,
      format,
      directory: opts.output ?? cfg.reports.directory
    });

    if (format === "text") {
      console.log(`\n${run.report.body}`);
    }
    if (run.saveError) {
      throw run.saveError;
    }
    console.log(`\nReport saved: ${run.path}`);
  });

program
  .command("ping")
  .description("Test network connectivity, optionally with a speedtest")
  .argument("[host]", "Host to ping")
  .option("-s, --speedtest", "Also measure download/upload throughput (takes a while)", false)
  .option("-c, --config <path>", "Path to config file")
  .action(async (host: string | undefined, opts: PingOptions) => {
    const { orchestrator } = setup(opts);
    const result = await orchestrator.ping(host ?? orchestrator.defaultHost);
    console.log(formatPingResult(result));

    if (opts.speedtest) {
      console.log("\n⏳ Running speedtest, this can take up to a minute...");
      console.log(`\n${formatThroughput(await orchestrator.throughput.measureThroughput())}`);
    }
  });

program
  .command("serve")
  .description("Serve the web terminal API")
  .option("-p, --port <port>", "Port to listen on")
  .option("-b, --bind <address>", "Address to bind")
  .option("-c, --config <path>", "Path to config file")
  .action(async (opts: ServeOptions) => {
    const { cfg, logger, orchestrator } = setup(opts);
    const { CommandDispatcher } = await import("../core/dispatcher");
    const { ThroughputJobs } = await import("../core/throughput-jobs");
    const { SysTrackServer } = await import("../web/server");

    const jobs = new ThroughputJobs(() => orchestrator.throughput.measureThroughput(), logger);
    const server = new SysTrackServer(new CommandDispatcher(orchestrator, logger, jobs), jobs, logger);
    const port = opts.port ? Number.parseInt(opts.port, 10) : cfg.server.port;
    const bind = opts.bind ?? cfg.server.bind;
    const actual = await server.start(port, bind);
    console.log(`✅ SysTrack web API on http://${bind}:${actual} (POST /api/command)`);

    process.once("SIGTERM", () => {
      server.stop().then(() => process.exit(0), () => process.exit(1));
    });
  });

program
  .command("config:init")
  .description("Create a starter config")
  .option("-o, --output <path>", "Output path", "./systrack.yaml")
  .action((opts: { output: string }) => {
    const out = path.resolve(opts.output);
    fs.writeFileSync(out, YAML.stringify(defaultConfig()), "utf8");
    console.log(`✅ Wrote starter config to ${out}`);
  });

program
  .command("validate")
  .description("Validate configuration against schema")
  .option("-c, --config <path>", "Path to config file", "./systrack.yaml")
  .action((opts: { config: string }) => {
    const cfg = parseConfigFile(path.resolve(opts.config));
    console.log("✅ Configuration is valid.");
    console.log(`📁 Reports: ${cfg.reports.directory}/${cfg.reports.prefix}_*.${cfg.reports.format === "json" ? "json" : "txt"}`);
    console.log(`🌐 Ping target: ${cfg.network.host} (timeout ${cfg.network.timeout_seconds}s)`);
  });

program
  .command("schema:emit")
  .description("Emit JSON Schema from Zod")
  .option("-o, --output <path>", "Output file", "./docs/config.schema.json")
  .action(async (opts: { output: string }) => {
    const schema = await configJsonSchema();
    fs.mkdirSync(path.dirname(opts.output), { recursive: true });
    fs.writeFileSync(opts.output, JSON.stringify(schema, null, 2));
    console.log(`✅ Wrote JSON Schema to ${opts.output}`);
  });

process.once("SIGINT", () => {
  console.error("\n\nOperation cancelled by user.");
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`❌ ${error.message}`);
    error.issues.forEach(issue => console.error(`- ${issue}`));
  } else {
    console.error(`\nError: ${describeError(error)}`);
  }
  process.exit(1);
});
