import { describe, it, expect } from "vitest";
import { assetBasename, splitExtension, uniqueName } from "./unique-name";

describe("assetBasename", () => {
  it("takes the last path segment", () => {
    expect(
      assetBasename("https://ar5iv.org/html/1234.5678/assets/x1.png?v=2", "image"),
    ).toBe("x1.png");
  });

  it("uses the fallback for an empty path", () => {
    expect(assetBasename("https://ar5iv.org/", "image")).toBe("image");
  });

  it("uses the fallback when the path ends in a slash", () => {
    expect(assetBasename("https://ar5iv.org/figures/", "image")).toBe("image");
  });
});

describe("splitExtension", () => {
  it("splits on the last dot", () => {
    expect(splitExtension("figure.v2.png", ".bin")).toEqual([
      "figure.v2",
      ".png",
    ]);
  });

  it("supplies the fallback extension", () => {
    expect(splitExtension("figure", ".bin")).toEqual(["figure", ".bin"]);
  });
});

describe("uniqueName", () => {
  it("returns the name unchanged when it is free", async () => {
    const name = await uniqueName("x1.png", ".bin", async () => false);
    expect(name).toBe("x1.png");
  });

  it("numbers colliding names stem, stem-1, stem-2", async () => {
    const taken = new Set<string>();
    const isTaken = async (candidate: string) => taken.has(candidate);

    const names: string[] = [];
    for (let i = 0; i < 4; i++) {
      const name = await uniqueName("x1.png", ".bin", isTaken);
      taken.add(name);
      names.push(name);
    }

    expect(names).toEqual(["x1.png", "x1-1.png", "x1-2.png", "x1-3.png"]);
  });

  it("adds the fallback extension before numbering", async () => {
    const taken = new Set(["figure.bin"]);
    const name = await uniqueName("figure", ".bin", async (c) => taken.has(c));
    expect(name).toBe("figure-1.bin");
  });
});
