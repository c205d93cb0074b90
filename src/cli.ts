#!/usr/bin/env node

import { realpathSync } from "node:fs";
import { pathToFileURL } from "node:url";
import { Command } from "commander";
import { loadConfig, resolveConfigPath, writeDefaultConfig } from "./config.js";
import { startProxy } from "./proxy-server.js";

const DEFAULT_PROXY_URL = "http://127.0.0.1:8082";

export interface CliOutput {
  out(line: string): void;
}

const consoleOutput: CliOutput = { out: (line) => console.log(line) };

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function formatExamples(examples: string[]): string {
  return "\n\nExamples:\n" + examples.map((ex) => `  $ ${ex}`).join("\n");
}

interface AdminOptions {
  proxyUrl: string;
  adminToken: string;
}

async function readError(res: Response): Promise<string> {
  const text = await res.text().catch(() => "");
  return `HTTP ${res.status}${text ? `: ${text}` : ""}`;
}

export function buildProgram(output: CliOutput = consoleOutput): Command {
  const program: Command = new Command();

  program
    .name("proving-proxy")
    .description(
      "Dispatch proxy for proof-generation jobs.\n\n" +
        "Clients submit jobs over HTTP; the proxy queues them and forwards each\n" +
        "one to an idle worker, retrying on another worker when one fails."
    )
    .version("0.1.0");

  program
    .command("init")
    .description(
      "Write a configuration file with default settings." +
        formatExamples(["proving-proxy init", "proving-proxy init --config ./proxy.json --force"])
    )
    .option("-c, --config <path>", "Where to write the configuration file")
    .option("--force", "Overwrite an existing file")
    .action((options: { config?: string; force?: boolean }) => {
      const path = resolveConfigPath(options.config);
      try {
        writeDefaultConfig(path, { force: options.force });
      } catch (err) {
        return program.error(describe(err), { exitCode: 1 });
      }
      output.out(`wrote default configuration to ${path}`);
    });

  program
    .command("start-proxy")
    .description(
      "Run the proxy and listen for jobs on <address>." +
        formatExamples([
          "proving-proxy start-proxy 0.0.0.0:8082",
          "proving-proxy start-proxy 127.0.0.1:9000 --config ./proxy.json",
        ]) +
        "\n\nEvery setting can be overridden with a PROVING_PROXY_* environment variable,\n" +
        "for example PROVING_PROXY_WORKERS=10.0.0.5:7001,10.0.0.6:7001"
    )
    .argument("<address>", "host:port to listen on")
    .option("-c, --config <path>", "Configuration file (default ./proving-proxy.json)")
    .action(async (address: string, options: { config?: string }) => {
      let app: Awaited<ReturnType<typeof startProxy>>;
      try {
        const config = loadConfig({ configPath: options.config });
        app = await startProxy(address, config);
      } catch (err) {
        return program.error(describe(err), { exitCode: 1 });
      }

      const shutdown = (signal: NodeJS.Signals) => {
        app.log.info({ signal }, "shutting down");
        app.close().then(
          () => process.exit(0),
          (err: unknown) => {
            app.log.error({ err }, "shutdown failed");
            process.exit(1);
          }
        );
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

  program
    .command("add-workers")
    .description(
      "Register workers with a running proxy." +
        formatExamples(["proving-proxy add-workers 10.0.0.5:7001 10.0.0.6:7001"])
    )
    .argument("<addresses...>", "worker host:port addresses")
    .option("--proxy-url <url>", "Base URL of the proxy", DEFAULT_PROXY_URL)
    .option("--admin-token <token>", "Value for the x-admin-token header", "admin-dev")
    .action(async (addresses: string[], options: AdminOptions) => {
      let res: Response;
      try {
        res = await fetch(new URL("/v1/workers", options.proxyUrl), {
          method: "POST",
          headers: { "content-type": "application/json", "x-admin-token": options.adminToken },
          body: JSON.stringify({ addresses }),
        });
      } catch (err) {
        return program.error(`could not reach ${options.proxyUrl}: ${describe(err)}`, { exitCode: 1 });
      }
      if (!res.ok) return program.error(`add-workers failed: ${await readError(res)}`, { exitCode: 1 });
      await res.arrayBuffer();
      output.out(`registered ${addresses.length}; proxy now has ${res.headers.get("x-worker-count")} workers`);
    });

  program
    .command("remove-workers")
    .description(
      "Deregister workers from a running proxy. A worker still running a job is\n" +
        "drained and removed once the job ends." +
        formatExamples(["proving-proxy remove-workers 10.0.0.5:7001"])
    )
    .argument("<addresses...>", "worker host:port addresses")
    .option("--proxy-url <url>", "Base URL of the proxy", DEFAULT_PROXY_URL)
    .option("--admin-token <token>", "Value for the x-admin-token header", "admin-dev")
    .action(async (addresses: string[], options: AdminOptions) => {
      for (const address of addresses) {
        let res: Response;
        try {
          res = await fetch(new URL(`/v1/workers/${encodeURIComponent(address)}`, options.proxyUrl), {
            method: "DELETE",
            headers: { "x-admin-token": options.adminToken },
          });
        } catch (err) {
          return program.error(`could not reach ${options.proxyUrl}: ${describe(err)}`, { exitCode: 1 });
        }
        if (!res.ok) {
          return program.error(`remove-workers failed for ${address}: ${await readError(res)}`, {
            exitCode: 1,
          });
        }
        const body: unknown = await res.json();
        const result =
          typeof body === "object" && body !== null && "result" in body ? String(body.result) : "?";
        output.out(`${address}: ${result}; proxy now has ${res.headers.get("x-worker-count")} workers`);
      }
    });

  return program;
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(script)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(describe(err));
      process.exitCode = 1;
    });
}
