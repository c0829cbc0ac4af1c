import { describe, it, expect, vi, afterEach } from "vitest";
import { Effect, LogLevel } from "effect";
import { CheckpointError, CheckpointService, ConfigError, LedgerService } from "@rubric/core";
import { MemoryLedger } from "@rubric/db";
import { CheckpointFrom, LedgerFrom, parseLogLevel, runLogged } from "@rubric/effect-runtime";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("parseLogLevel", () => {
  it("maps names case-insensitively and defaults to info", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.Debug);
    expect(parseLogLevel("WARN")).toBe(LogLevel.Warning);
    expect(parseLogLevel("warning")).toBe(LogLevel.Warning);
    expect(parseLogLevel("error")).toBe(LogLevel.Error);
    expect(parseLogLevel("none")).toBe(LogLevel.None);
    expect(parseLogLevel("bogus")).toBe(LogLevel.Info);
    expect(parseLogLevel(undefined)).toBe(LogLevel.Info);
  });
});

describe("runLogged", () => {
  it("resolves with the program's value", async () => {
    expect(await runLogged(Effect.succeed(3))).toBe(3);
  });

  it("rejects with the typed failure", async () => {
    await expect(runLogged(Effect.fail(new ConfigError({ message: "bad flag" })))).rejects.toBeInstanceOf(ConfigError);
  });

  it("prints through the pretty logger", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    await runLogged(Effect.logInfo("hello").pipe(Effect.zipRight(Effect.logWarning("careful"))));
    expect(log).toHaveBeenCalledTimes(1);
    expect(log.mock.calls[0][0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] INFO  hello$/);
    expect(err).toHaveBeenCalledTimes(1);
    expect(err.mock.calls[0][0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] WARN  careful$/);
  });

  it("drops messages below the minimum level", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    await runLogged(Effect.logDebug("hidden"), LogLevel.Info);
    await runLogged(Effect.logInfo("hidden"), LogLevel.Error);
    expect(log).not.toHaveBeenCalled();
  });
});

describe("service layers", () => {
  it("provide the ledger and checkpoint store", async () => {
    const ledger = new MemoryLedger();
    const checkpoint = {
      save: () => Effect.void,
      load: (path: string) => Effect.fail(new CheckpointError({ message: `nothing at ${path}` })),
    };
    const program = Effect.gen(function* () {
      const l = yield* LedgerService;
      const c = yield* CheckpointService;
      const runs = yield* Effect.promise(() => l.listRuns());
      const missing = yield* Effect.flip(c.load("x.bin"));
      return { runs, missing: missing.message };
    });
    const result = await Effect.runPromise(
      program.pipe(Effect.provide(LedgerFrom(ledger)), Effect.provide(CheckpointFrom(checkpoint))),
    );
    expect(result).toEqual({ runs: [], missing: "nothing at x.bin" });
  });
});
