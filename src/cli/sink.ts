import { once } from "node:events";
import type { FileHandle } from "node:fs/promises";
import type { Writable } from "node:stream";

/** Ordered text output that respects back-pressure. */
export interface TextSink {
  write(text: string): Promise<void>;
}

export function streamSink(stream: Writable): TextSink {
  return {
    async write(text) {
      if (!stream.write(text)) await once(stream, "drain");
    },
  };
}

export function fileSink(handle: FileHandle): TextSink {
  return {
    async write(text) {
      await handle.write(text);
    },
  };
}
