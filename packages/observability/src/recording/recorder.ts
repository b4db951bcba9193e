import { mkdir, open, type FileHandle } from "node:fs/promises";
import { dirname } from "node:path";
import { McapWriter } from "@mcap/core";
import type { RecordingConfig } from "@vigil/contracts";
import type { Recorder } from "../subsystems.js";
import { loadChunkCompressor } from "./codecs.js";

export class RecorderConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RecorderConfigError";
  }
}

export class RecorderClosedError extends Error {
  constructor() {
    super("Recorder has been closed");
    this.name = "RecorderClosedError";
  }
}

/** Sequential writer over a file handle, tracking its own offset. */
class FileSink {
  private offset = 0n;

  constructor(private readonly handle: FileHandle) {}

  async write(buffer: Uint8Array): Promise<void> {
    let written = 0;
    while (written < buffer.byteLength) {
      const result = await this.handle.write(buffer, written, buffer.byteLength - written);
      written += result.bytesWritten;
    }
    this.offset += BigInt(buffer.byteLength);
  }

  position(): bigint {
    return this.offset;
  }

  close(): Promise<void> {
    return this.handle.close();
  }
}

const encoder = new TextEncoder();

function nowNanos(): bigint {
  return BigInt(Date.now()) * 1_000_000n;
}

/**
 * Records JSON messages to an MCAP file, one schemaless channel per topic.
 */
export class McapRecorder implements Recorder {
  private readonly channels = new Map<string, number>();
  private readonly sequences = new Map<number, number>();
  private queue: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(
    private readonly writer: McapWriter,
    private readonly sink: FileSink,
    readonly path: string
  ) {}

  static async open(config: RecordingConfig): Promise<McapRecorder> {
    if (config.path.trim() === "") {
      throw new RecorderConfigError("recording.path must be set when recording is enabled");
    }

    const compressChunk = await loadChunkCompressor(config.compression);
    await mkdir(dirname(config.path), { recursive: true });
    const sink = new FileSink(await open(config.path, "w"));

    try {
      const writer = new McapWriter({
        writable: sink,
        useChunks: true,
        chunkSize: config.chunkSize,
        compressChunk
      });
      await writer.start({ profile: "", library: "vigil" });
      return new McapRecorder(writer, sink, config.path);
    } catch (error) {
      await sink.close();
      throw error;
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  record(topic: string, message: unknown, logTime: bigint = nowNanos()): Promise<void> {
    if (this.closed) {
      return Promise.reject(new RecorderClosedError());
    }
    return this.enqueue(() => this.append(topic, message, logTime));
  }

  close(): Promise<void> {
    if (this.closed) {
      return this.queue;
    }
    this.closed = true;
    return this.enqueue(async () => {
      try {
        await this.writer.end();
      } finally {
        await this.sink.close();
      }
    });
  }

  private enqueue(task: () => Promise<void>): Promise<void> {
    const run = this.queue.then(task);
    // A failed write must not wedge the writes queued behind it.
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async append(topic: string, message: unknown, logTime: bigint): Promise<void> {
    const channelId = await this.channelFor(topic);
    const sequence = this.sequences.get(channelId) ?? 0;
    this.sequences.set(channelId, sequence + 1);

    await this.writer.addMessage({
      channelId,
      sequence,
      logTime,
      publishTime: logTime,
      data: encoder.encode(JSON.stringify(message))
    });
  }

  private async channelFor(topic: string): Promise<number> {
    const existing = this.channels.get(topic);
    if (existing !== undefined) {
      return existing;
    }
    const id = await this.writer.registerChannel({
      topic,
      schemaId: 0,
      messageEncoding: "json",
      metadata: new Map()
    });
    this.channels.set(topic, id);
    return id;
  }
}

export function openRecorder(config: RecordingConfig): Promise<McapRecorder> {
  return McapRecorder.open(config);
}
