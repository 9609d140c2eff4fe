import type { Entry } from "../entries/types.ts";

export interface EntrySink {
  readonly name: string;
  write(entry: Entry): Promise<void>;
  close(): Promise<void>;
}

export type SinkResult = { sink: string; ok: true } | { sink: string; ok: false; error: string };
