#!/usr/bin/env node
import chalk from "chalk";
import { Command } from "commander";
import { createReadStream } from "node:fs";
import { outputFormat, renderChunks } from "./cli/render.js";
import { loadConfig } from "./config/config.js";
import { formatDiagnostics, formatError } from "./errors/reporter.js";
import { createLogger } from "./logging/logger.js";
import { createRelay, newRequestId } from "./relay.js";
import { WasmSigner } from "./signing/signer.js";

async function* readBytes(input: NodeJS.ReadableStream): AsyncGenerator<Uint8Array, void, undefined> {
  for await (const chunk of input) {
    yield typeof chunk === "string" ? Buffer.from(chunk, "utf-8") : chunk;
  }
}

function fail(e: unknown): never {
  console.error(formatError(e));
  process.exit(1);
}

const program = new Command()
  .name("chatrelay")
  .description("Signs chat backend requests and turns its event stream into chat-completion chunks")
  .version("0.4.0");

interface SignOptions {
  module: string;
  nonce: string;
  timestamp: string;
  deviceId: string;
  query: string;
}

program
  .command("sign")
  .description("Compute a request signature with a signing module (.wasm or .wat)")
  .requiredOption("-m, --module <path>", "Signing module file")
  .requiredOption("--nonce <nonce>", "Request nonce")
  .requiredOption("--timestamp <seconds>", "Unix timestamp in seconds")
  .requiredOption("--device-id <id>", "Device identifier")
  .requiredOption("-q, --query <text>", "Request content")
  .action(async (opts: SignOptions) => {
    try {
      const config = loadConfig();
      const logger = createLogger({ level: config.logLevel });
      const signer = WasmSigner.fromFile(opts.module, { logger });
      console.log(await signer.sign(opts.nonce, opts.timestamp, opts.deviceId, opts.query));
    } catch (e) {
      fail(e);
    }
  });

interface TransduceCommandOptions {
  sse?: boolean;
  aggregate?: boolean;
  requestId?: string;
  model?: string;
}

program
  .command("transduce [file]")
  .description("Replay a captured SSE body (file or stdin) as chat-completion chunks")
  .option("--sse", "Write event-stream frames ending in data: [DONE]")
  .option("--aggregate", "Write one aggregated chat.completion object")
  .option("--request-id <id>", "Id reported in every chunk")
  .option("--model <name>", "Model reported in every chunk")
  .action(async (file: string | undefined, opts: TransduceCommandOptions) => {
    try {
      const format = outputFormat(opts);
      const config = loadConfig();
      const logger = createLogger({ level: config.logLevel });
      const relay = createRelay({ config, logger });

      const requestId = opts.requestId ?? newRequestId();
      const model = opts.model ?? config.defaultModel;
      const input = file === undefined ? process.stdin : createReadStream(file);
      const transducer = relay.transduce(readBytes(input), { requestId, model });

      for await (const text of renderChunks(transducer, format, { id: requestId, model })) {
        process.stdout.write(text);
      }
      if (transducer.diagnostics.length > 0) {
        console.error(formatDiagnostics(transducer.diagnostics));
      }
      if (transducer.accumulator.error !== undefined) {
        process.exitCode = 1;
      }
    } catch (e) {
      fail(e);
    }
  });

interface ChatCommandOptions {
  json?: boolean;
  model?: string;
  searchMode?: string;
  expert?: boolean;
  language?: string;
  threadId?: string;
}

program
  .command("chat <content...>")
  .description("Send a signed request to the backend and stream the answer")
  .option("--json", "Print chunks as JSON lines instead of plain text")
  .option("--model <name>", "Gateway model name (mapped to the backend identifier)")
  .option("--search-mode <mode>", "Backend search mode")
  .option("--expert", "Ask for expert mode")
  .option("--language <code>", "Answer language")
  .option("--thread-id <id>", "Continue an existing thread")
  .action(async (content: string[], opts: ChatCommandOptions) => {
    try {
      const config = loadConfig();
      const logger = createLogger({ level: config.logLevel });
      const relay = createRelay({ config, logger });

      const request: { searchMode?: string; isExpert?: boolean; language?: string; threadId?: string } = {};
      if (opts.searchMode !== undefined) request.searchMode = opts.searchMode;
      if (opts.expert) request.isExpert = true;
      if (opts.language !== undefined) request.language = opts.language;
      if (opts.threadId !== undefined) request.threadId = opts.threadId;

      const transducer = await relay.stream(content.join(" "), { model: opts.model, request });
      for await (const chunk of transducer) {
        if (opts.json) {
          console.log(JSON.stringify(chunk));
          continue;
        }
        const text = chunk.choices[0].delta.content;
        if (text !== undefined && transducer.accumulator.error === undefined) {
          process.stdout.write(text);
        }
      }

      const acc = transducer.accumulator;
      if (!opts.json) process.stdout.write("\n");
      if (acc.error !== undefined) {
        console.error(chalk.red(`Stream error: ${acc.error}`));
        process.exitCode = 1;
        return;
      }
      if (!opts.json && acc.relatedQuestions.length > 0) {
        console.error(chalk.dim("Related questions:"));
        for (const q of acc.relatedQuestions) console.error(chalk.dim(`  - ${q}`));
      }
      const threadId = acc.scalar("threadId");
      if (threadId !== undefined) console.error(chalk.dim(`thread: ${threadId}`));
    } catch (e) {
      fail(e);
    }
  });

program.parseAsync().catch(fail);
