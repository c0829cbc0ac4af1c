/**
 * Checkpoint save/load.
 *
 * Binary layout:
 *   [4 bytes: magic "RBRC"]
 *   [4 bytes: uint32 LE header JSON byte length]
 *   [N bytes: header JSON (UTF-8)]
 *   [remaining: concatenated raw Float32 policy tensors]
 */
import { mkdir, open, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Effect } from "effect";
import { CheckpointError, type Checkpoint, type CheckpointState, type PolicyTensor } from "@rubric/core";

const MAGIC = Buffer.from("RBRC");

interface TensorEntry {
  name: string;
  shape: number[];
  elements: number;
}

interface Header {
  kind: string;
  vocab: string[];
  step: number;
  configHash: string;
  tensors: TensorEntry[];
}

// ── Save ───────────────────────────────────────────────────────────────────

async function saveBinary(path: string, state: CheckpointState): Promise<void> {
  const tensors: TensorEntry[] = [];
  const f32Arrays: Float32Array[] = [];

  for (const [name, t] of Object.entries(state.policy.params)) {
    tensors.push({ name, shape: [...t.shape], elements: t.data.length });
    f32Arrays.push(t.data);
  }

  const header: Header = {
    kind: state.policy.kind,
    vocab: [...state.policy.vocab],
    step: state.step,
    configHash: state.configHash,
    tensors,
  };
  const headerBuf = Buffer.from(JSON.stringify(header), "utf-8");

  await mkdir(dirname(path), { recursive: true });
  const handle = await open(path, "w");
  try {
    await handle.write(MAGIC);
    const lenBuf = Buffer.alloc(4);
    lenBuf.writeUInt32LE(headerBuf.length, 0);
    await handle.write(lenBuf);
    await handle.write(headerBuf);
    for (const f32 of f32Arrays) {
      await handle.write(Buffer.from(f32.buffer, f32.byteOffset, f32.byteLength));
    }
  } finally {
    await handle.close();
  }
}

// ── Load ───────────────────────────────────────────────────────────────────

function isNumberArray(v: unknown): v is number[] {
  return Array.isArray(v) && v.every((n) => typeof n === "number" && Number.isInteger(n) && n >= 0);
}

function parseTensorEntry(v: unknown): TensorEntry {
  if (typeof v === "object" && v !== null && "name" in v && "shape" in v && "elements" in v) {
    const { name, shape, elements } = v;
    if (typeof name === "string" && isNumberArray(shape) && typeof elements === "number") {
      return { name, shape, elements };
    }
  }
  throw new Error("malformed tensor table entry");
}

function parseHeader(raw: unknown): Header {
  if (typeof raw !== "object" || raw === null) throw new Error("header is not an object");
  const h = new Map(Object.entries(raw));
  const kind = h.get("kind");
  const vocab = h.get("vocab");
  const step = h.get("step");
  const configHash = h.get("configHash");
  const tensors = h.get("tensors");
  if (typeof kind !== "string") throw new Error("header.kind must be a string");
  if (!Array.isArray(vocab) || !vocab.every((w): w is string => typeof w === "string")) {
    throw new Error("header.vocab must be a list of strings");
  }
  if (typeof step !== "number") throw new Error("header.step must be a number");
  if (typeof configHash !== "string") throw new Error("header.configHash must be a string");
  if (!Array.isArray(tensors)) throw new Error("header.tensors must be a list");
  return {
    kind,
    vocab,
    step,
    configHash,
    tensors: tensors.map(parseTensorEntry),
  };
}

export function decodeCheckpoint(data: Buffer): CheckpointState {
  if (data.length < 8 || !data.subarray(0, 4).equals(MAGIC)) {
    throw new Error("not a checkpoint file (bad magic)");
  }
  let offset = 4;
  const headerLen = data.readUInt32LE(offset);
  offset += 4;
  if (offset + headerLen > data.length) throw new Error("truncated header");
  const parsed: unknown = JSON.parse(data.subarray(offset, offset + headerLen).toString("utf-8"));
  const header = parseHeader(parsed);
  offset += headerLen;

  const params: Record<string, PolicyTensor> = {};
  for (const t of header.tensors) {
    const byteLen = t.elements * 4;
    if (offset + byteLen > data.length) throw new Error(`truncated tensor ${t.name}`);
    // Copy so the tensor owns an aligned buffer.
    const f32 = new Float32Array(data.buffer.slice(data.byteOffset + offset, data.byteOffset + offset + byteLen));
    offset += byteLen;
    params[t.name] = { shape: t.shape, data: f32 };
  }

  return {
    policy: { kind: header.kind, vocab: header.vocab, params },
    configHash: header.configHash,
    step: header.step,
  };
}

// ── FileCheckpoint ─────────────────────────────────────────────────────────

export class FileCheckpoint implements Checkpoint {
  save(path: string, state: CheckpointState): Effect.Effect<void, CheckpointError> {
    return Effect.tryPromise({
      try: () => saveBinary(path, state),
      catch: (e) => new CheckpointError({ message: `Failed to save checkpoint ${path}: ${e}`, cause: e }),
    });
  }

  load(path: string): Effect.Effect<CheckpointState, CheckpointError> {
    return Effect.tryPromise({
      try: async () => decodeCheckpoint(await readFile(path)),
      catch: (e) => new CheckpointError({ message: `Failed to load checkpoint ${path}: ${e}`, cause: e }),
    });
  }
}
