import { charForRecency, renderAsciiFrame } from "@/render/AsciiRenderer";
import { describe, expect, it } from "vitest";

describe("charForRecency", () => {
  it("should pick denser symbols for newer points", () => {
    expect(charForRecency(0.95)).toBe("●");
    expect(charForRecency(0.8)).toBe("◆");
    expect(charForRecency(0.6)).toBe("▲");
    expect(charForRecency(0.4)).toBe("♦");
    expect(charForRecency(0.1)).toBe("·");
  });

  it("should use strict thresholds", () => {
    expect(charForRecency(0.9)).toBe("◆");
    expect(charForRecency(0.3)).toBe("·");
  });
});

describe("renderAsciiFrame", () => {
  it("should return one full-width row per terminal line", () => {
    const rows = renderAsciiFrame([], 80, 24, 3);

    expect(rows).toHaveLength(24);
    expect(rows.every((row) => [...row].length === 80)).toBe(true);
    expect(rows[0]).toBe("Frame: 3 | Lorenz Attractor".padEnd(80));
    expect(rows[1]).toBe(" ".repeat(80));
  });

  it("should truncate the header to the terminal width", () => {
    const rows = renderAsciiFrame([], 10, 3, 3);

    expect(rows[0]).toBe("Frame: 3 |");
  });

  it("should place a point with the shared projection", () => {
    // 80x24: x = 0 + 40, y = trunc(19.2 - 10 * 0.4) = 15
    const rows = renderAsciiFrame([{ x: 0, y: 0, z: 10 }], 80, 24, 0);

    expect([...(rows[15] ?? "")][40]).toBe("·");
  });

  it("should let newer points overwrite older ones", () => {
    const point = { x: 0, y: 0, z: 10 };
    const trail = Array.from({ length: 10 }, () => point);
    const rows = renderAsciiFrame(trail, 80, 24, 0);

    // The last point has recency 9/10
    expect([...(rows[15] ?? "")][40]).toBe("◆");
  });

  it("should drop points outside the terminal", () => {
    const rows = renderAsciiFrame([{ x: 500, y: 0, z: -500 }], 80, 24, 0);

    expect(rows.slice(1).every((row) => row.trim() === "")).toBe(true);
  });
});
