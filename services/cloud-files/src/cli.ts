#!/usr/bin/env node
import "dotenv/config";
import { readFile, writeFile } from "fs/promises";
import { authorizationPrompt, parseCommand, runCommand, USAGE, type CommandIO } from "./commands.js";
import { parseEnv, toManagerInput } from "./config.js";
import { LoopbackConsentPresenter } from "./identity/loopbackPresenter.js";
import { Logger, LoggerService } from "./logger.js";
import { createCloudFilesManager } from "./storage/factory.js";

async function main(argv: readonly string[]): Promise<number> {
  const command = parseCommand(argv);
  if (!command) {
    process.stderr.write(`${USAGE}\n`);
    return 2;
  }

  const env = parseEnv(process.env);
  const logger = new LoggerService({ level: env.LOG_LEVEL });
  const manager = createCloudFilesManager({ ...toManagerInput(env), logger });
  const io: CommandIO = {
    readFile: (path) => readFile(path),
    writeFile: (path, data) => writeFile(path, data),
    print: (line) => process.stdout.write(`${line}\n`),
    printError: (line) => process.stderr.write(`${line}\n`)
  };
  const presenter = new LoopbackConsentPresenter({
    port: env.OAUTH_REDIRECT_PORT,
    logger,
    onAuthorizationUrl: authorizationPrompt(io)
  });

  return runCommand(command, manager, presenter, io);
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    Logger.error("cli", "unexpected failure", error);
    process.exitCode = 1;
  }
);
