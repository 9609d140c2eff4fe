import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import type { Entry } from "../entries/types.ts";
import { WriteLock } from "../util/lock.ts";
import type { EntrySink } from "./types.ts";

export class JsonlFileSink implements EntrySink {
  readonly name = "file";
  private readonly lock = new WriteLock();
  private dirReady = false;

  constructor(readonly filePath: string) {}

  write(entry: Entry): Promise<void> {
    const line = `${JSON.stringify(entry)}\n`;
    return this.lock.run(async () => {
      if (!this.dirReady) {
        await mkdir(path.dirname(this.filePath), { recursive: true });
        this.dirReady = true;
      }
      await appendFile(this.filePath, line, "utf8");
    });
  }

  async close(): Promise<void> {
    // Drain any append still holding the lock.
    await this.lock.run(async () => undefined);
  }
}
