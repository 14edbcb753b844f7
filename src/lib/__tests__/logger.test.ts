import { describe, it, expect } from "vitest";
import { createLogger } from "../logger.js";
import { loadConfig } from "../config.js";

function capture(debug: boolean) {
  const lines: string[] = [];
  const log = createLogger("test", { debug, sink: (line) => lines.push(line) });
  return { log, lines };
}

describe("createLogger", () => {
  it("prefixes lines with the scope and level", () => {
    const { log, lines } = capture(false);
    log.info("hello", { a: 1 });
    log.warn("careful");
    expect(lines).toEqual(['[shift-cipher:test] info: hello {"a":1}', "[shift-cipher:test] warn: careful"]);
  });

  it("drops debug lines unless enabled", () => {
    const quiet = capture(false);
    quiet.log.debug("hidden");
    expect(quiet.lines).toEqual([]);

    const loud = capture(true);
    loud.log.debug("shown");
    expect(loud.lines).toEqual(["[shift-cipher:test] debug: shown"]);
  });

  it("times a phase and passes its result through", async () => {
    const { log, lines } = capture(true);
    const result = await log.timed("step", () => 42);
    expect(result).toBe(42);
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[shift-cipher:test\] debug: step \{"ms":[0-9.]+\}$/);
  });

  it("still logs the timing when the phase throws", async () => {
    const { log, lines } = capture(true);
    await expect(log.timed("fails", async () => { throw new Error("nope"); })).rejects.toThrow("nope");
    expect(lines).toHaveLength(1);
  });
});

describe("loadConfig", () => {
  it("enables debug only for SHIFT_CIPHER_DEBUG=1", () => {
    expect(loadConfig({ SHIFT_CIPHER_DEBUG: "1" }, false)).toEqual({ debug: true, color: false });
    expect(loadConfig({ SHIFT_CIPHER_DEBUG: "yes" }, false).debug).toBe(false);
  });

  it("uses colour on a TTY unless NO_COLOR is set", () => {
    expect(loadConfig({}, true).color).toBe(true);
    expect(loadConfig({ NO_COLOR: "" }, true).color).toBe(false);
  });
});
