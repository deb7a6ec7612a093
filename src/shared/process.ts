import { spawn } from "node:child_process";

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  env?: NodeJS.ProcessEnv;
  // Forward child output to our stderr while it runs.
  stream?: boolean;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: RunCommandOptions,
) => Promise<CommandResult>;

export class CommandStartError extends Error {
  constructor(
    public readonly command: string,
    cause: unknown,
  ) {
    super(`Failed to start ${command}: ${cause instanceof Error ? cause.message : String(cause)}`);
    this.name = "CommandStartError";
  }
}

export const spawnCommand: CommandRunner = (command, args, options = {}) =>
  new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      env: options.env ?? process.env,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on("data", (chunk: Buffer) => {
      stdout.push(chunk);
      if (options.stream) {
        process.stderr.write(chunk);
      }
    });

    child.stderr.on("data", (chunk: Buffer) => {
      stderr.push(chunk);
      if (options.stream) {
        process.stderr.write(chunk);
      }
    });

    child.on("error", (error) => {
      reject(new CommandStartError(command, error));
    });

    child.on("close", (code) => {
      resolve({
        code: code ?? 1,
        stdout: Buffer.concat(stdout).toString("utf8"),
        stderr: Buffer.concat(stderr).toString("utf8"),
      });
    });
  });
