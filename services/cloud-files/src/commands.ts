import { z } from "zod";
import type { ConsentPresenter } from "./identity/types.js";
import { needsReauthorization, type CloudFilesError } from "./storage/errors.js";
import type { CloudFilesManager } from "./storage/manager.js";
import type { Metadata } from "./storage/types.js";

export const USAGE = "usage: cloud-files <status | push <path> | pull <path>>";

const commandSchema = z.discriminatedUnion("command", [
  z.object({ command: z.literal("status") }),
  z.object({ command: z.literal("push"), path: z.string().min(1) }),
  z.object({ command: z.literal("pull"), path: z.string().min(1) })
]);

export type Command = z.infer<typeof commandSchema>;

export type ManagedFile = Pick<
  CloudFilesManager<unknown>,
  "provider" | "fileName" | "link" | "fetch" | "download" | "upload" | "unlink"
>;

export type CommandIO = {
  readFile: (path: string) => Promise<Uint8Array>;
  writeFile: (path: string, data: Uint8Array) => Promise<void>;
  print: (line: string) => void;
  printError: (line: string) => void;
};

export function parseCommand(argv: readonly string[]): Command | undefined {
  const [command, path] = argv;
  const parsed = commandSchema.safeParse({ command, path });
  return parsed.success ? parsed.data : undefined;
}

export function describeError(error: CloudFilesError): string {
  return needsReauthorization(error) ? `${error.message}; link the account again` : error.message;
}

/** Prints the consent URL on the error output, outside the level-filtered logger. */
export function authorizationPrompt(io: Pick<CommandIO, "printError">): (url: string) => void {
  return (url) => io.printError(`open this URL to continue: ${url}`);
}

async function link(manager: ManagedFile, presenter: ConsentPresenter, io: CommandIO): Promise<boolean> {
  const linked = await manager.link(presenter);
  if (linked.isErr()) {
    io.printError(describeError(linked.error));
    return false;
  }
  return true;
}

async function fetchMetadata(manager: ManagedFile, io: CommandIO): Promise<Metadata | null | undefined> {
  const fetched = await manager.fetch();
  if (fetched.isErr()) {
    io.printError(describeError(fetched.error));
    return undefined;
  }
  if (fetched.value.kind === "notFound") {
    io.print(`${manager.fileName}: not found on ${manager.provider}`);
    return null;
  }
  return fetched.value.metadata;
}

async function status(manager: ManagedFile, presenter: ConsentPresenter, io: CommandIO): Promise<number> {
  if (!(await link(manager, presenter, io))) return 1;
  const metadata = await fetchMetadata(manager, io);
  if (metadata === undefined) return 1;
  if (metadata === null) return 0;
  io.print(
    `${manager.fileName}: id=${metadata.id} size=${metadata.size} modified=${metadata.lastModified.toISOString()}`
  );
  return 0;
}

async function push(manager: ManagedFile, presenter: ConsentPresenter, io: CommandIO, path: string): Promise<number> {
  // Read before linking so a bad path fails without a consent round trip.
  const payload = await io.readFile(path);
  if (!(await link(manager, presenter, io))) return 1;

  const uploaded = await manager.upload(payload);
  if (uploaded.isErr()) {
    io.printError(describeError(uploaded.error));
    return 1;
  }
  io.print(`uploaded ${manager.fileName}: ${uploaded.value.size} bytes at ${uploaded.value.lastModified.toISOString()}`);
  return 0;
}

async function pull(manager: ManagedFile, presenter: ConsentPresenter, io: CommandIO, path: string): Promise<number> {
  if (!(await link(manager, presenter, io))) return 1;
  const metadata = await fetchMetadata(manager, io);
  if (!metadata) return 1;

  const downloaded = await manager.download(metadata.id);
  if (downloaded.isErr()) {
    io.printError(describeError(downloaded.error));
    return 1;
  }
  await io.writeFile(path, downloaded.value);
  io.print(`downloaded ${manager.fileName}: ${downloaded.value.byteLength} bytes to ${path}`);
  return 0;
}

function execute(command: Command, manager: ManagedFile, presenter: ConsentPresenter, io: CommandIO): Promise<number> {
  switch (command.command) {
    case "status":
      return status(manager, presenter, io);
    case "push":
      return push(manager, presenter, io, command.path);
    case "pull":
      return pull(manager, presenter, io, command.path);
  }
}

/** Runs one command against a manager and ends the session afterwards. Returns the exit code. */
export async function runCommand(
  command: Command,
  manager: ManagedFile,
  presenter: ConsentPresenter,
  io: CommandIO
): Promise<number> {
  try {
    return await execute(command, manager, presenter, io);
  } finally {
    manager.unlink();
  }
}
