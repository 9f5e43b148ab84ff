import { spawn, type SpawnOptions } from "child_process";
import { createWriteStream, promises as fs } from "fs";
import path from "path";
import { finished } from "stream/promises";

// Exit code reported when the program could not be started at all, as a shell would.
export const EXIT_NOT_STARTED = 127;

export async function spawnToFiles(
  command: string,
  args: string[],
  options: Pick<SpawnOptions, "cwd" | "env">,
  stdoutPath: string,
  stderrPath: string
): Promise<number> {
  await fs.mkdir(path.dirname(stdoutPath), { recursive: true });
  await fs.mkdir(path.dirname(stderrPath), { recursive: true });

  const stdout = createWriteStream(stdoutPath);
  const stderr = createWriteStream(stderrPath);

  const child = spawn(command, args, {
    ...options,
    stdio: ["ignore", "pipe", "pipe"] as const
  });

  child.stdout?.pipe(stdout);
  child.stderr?.pipe(stderr);

  const exitCode = await new Promise<number>((resolve) => {
    child.on("error", (err: NodeJS.ErrnoException) => {
      if (!stderr.writableEnded) stderr.write(`failed to start ${command}: ${err.message}\n`);
      resolve(err.code === "ENOENT" ? EXIT_NOT_STARTED : 1);
    });
    child.on("close", (code: number | null, signal: NodeJS.Signals | null) => {
      if (signal && !stderr.writableEnded) stderr.write(`\n[terminated by ${signal}]\n`);
      resolve(code ?? 1);
    });
  });

  if (!stdout.writableEnded) stdout.end();
  if (!stderr.writableEnded) stderr.end();
  await Promise.all([finished(stdout), finished(stderr)]);

  return exitCode;
}
