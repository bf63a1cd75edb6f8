import { describe, expect, it } from "vitest";

import { createRuntimeLogger } from "../logger.js";

function createSink(): { lines: unknown[]; write: (msg: string) => void } {
  const lines: unknown[] = [];
  return {
    lines,
    write: (msg: string) => {
      lines.push(JSON.parse(msg));
    },
  };
}

describe("createRuntimeLogger", () => {
  it("binds the module name and structured data", () => {
    const sink = createSink();
    const logger = createRuntimeLogger({
      level: "debug",
      pretty: false,
      module: "animation-driver",
      destination: sink,
    });

    logger.debug("fling started", { velocity: -2 });

    expect(sink.lines).toHaveLength(1);
    expect(sink.lines[0]).toMatchObject({
      level: 20,
      module: "animation-driver",
      service: "docksheet",
      velocity: -2,
      msg: "fling started",
    });
  });

  it("filters entries below the configured level", () => {
    const sink = createSink();
    const logger = createRuntimeLogger({ level: "warn", pretty: false, destination: sink });

    logger.info("ignored");
    logger.warn("kept");

    expect(sink.lines).toEqual([expect.objectContaining({ msg: "kept" })]);
  });

  it("serializes errors under err", () => {
    const sink = createSink();
    const logger = createRuntimeLogger({ level: "info", pretty: false, destination: sink });

    logger.error("bad options", new Error("boom"));

    expect(sink.lines[0]).toMatchObject({ err: { message: "boom", type: "Error" } });
  });

  it("merges child bindings", () => {
    const sink = createSink();
    const logger = createRuntimeLogger({ level: "info", pretty: false, destination: sink });

    logger.child({ sheet: "primary" }).info("layout");

    expect(sink.lines[0]).toMatchObject({ sheet: "primary", msg: "layout" });
  });
});
