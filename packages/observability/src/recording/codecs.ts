import type { Compression } from "@vigil/contracts";

export type ChunkCompressor = (chunk: Uint8Array) => { compression: string; compressedData: Uint8Array };

interface WasmCodec {
  isLoaded: Promise<unknown>;
  compress(data: Uint8Array): Uint8Array;
}

function isWasmCodec(value: unknown): value is WasmCodec {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null &&
    "isLoaded" in value &&
    "compress" in value &&
    typeof value.compress === "function"
  );
}

// The wasm codec ships as CommonJS; depending on the loader the API is the
// namespace itself or its default export, which may be a function.
async function loadCodec(name: string, pending: Promise<unknown>): Promise<WasmCodec> {
  const loaded = await pending;
  const codec = isWasmCodec(loaded)
    ? loaded
    : typeof loaded === "object" && loaded !== null && "default" in loaded && isWasmCodec(loaded.default)
      ? loaded.default
      : undefined;

  if (!codec) {
    throw new Error(`${name} does not expose a compress() codec`);
  }

  await codec.isLoaded;
  return codec;
}

/**
 * Resolve the MCAP chunk compressor for a compression mode. `"none"` writes
 * uncompressed chunks.
 */
export async function loadChunkCompressor(mode: Compression): Promise<ChunkCompressor | undefined> {
  switch (mode) {
    case "none":
      return undefined;
    case "zstd": {
      const codec = await loadCodec("@foxglove/wasm-zstd", import("@foxglove/wasm-zstd"));
      return (chunk) => ({ compression: "zstd", compressedData: codec.compress(chunk) });
    }
  }
}
