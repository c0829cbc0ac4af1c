/**
 * Effect layers for dependency injection.
 */
import { Layer } from "effect";
import {
  CheckpointService, LedgerService,
  type Checkpoint, type RunLedger,
} from "@rubric/core";

// ── Checkpoint Layer ───────────────────────────────────────────────────────

export const CheckpointFrom = (checkpoint: Checkpoint) =>
  Layer.succeed(CheckpointService, checkpoint);

// ── Ledger Layer ───────────────────────────────────────────────────────────

export const LedgerFrom = (ledger: RunLedger) =>
  Layer.succeed(LedgerService, ledger);
