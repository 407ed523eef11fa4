import { afterEach, beforeEach, describe, it, expect } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { HistoryRing } from "../../src/core/console/history";
import { isWritable, planWrite, readHistoryFile, writeHistoryFile } from "../../src/core/console/historyFile";
import { makeTempDir, removeDir } from "../helpers/console";

function ringOf(maxSize: number, ...entries: string[]): HistoryRing {
  const ring = new HistoryRing(maxSize);
  for (const e of entries) ring.push(e);
  return ring;
}

describe("HistoryRing", () => {
  it("rejects a non-positive size", () => {
    expect(() => new HistoryRing(0)).toThrow(RangeError);
    expect(() => new HistoryRing(1.5)).toThrow("history size must be a positive integer, got 1.5");
  });

  describe("push", () => {
    it("does not repeat an entry", () => {
      expect(ringOf(10, "a", "a").entries()).toEqual(["a"]);
    });

    it("moves a resubmitted entry to the tail", () => {
      expect(ringOf(10, "a", "b", "a").entries()).toEqual(["b", "a"]);
    });
  });

  describe("enforceBound", () => {
    it("keeps the first maxSize entries", () => {
      const ring = ringOf(3, "1", "2", "3", "4", "5");
      ring.enforceBound();
      expect(ring.entries()).toEqual(["1", "2", "3"]);
    });

    it("drops new submissions once full", () => {
      const ring = new HistoryRing(2);
      for (const e of ["a", "b", "c"]) {
        ring.push(e);
        ring.enforceBound();
      }
      expect(ring.entries()).toEqual(["a", "b"]);
    });
  });

  describe("navigate", () => {
    it("steps forward and wraps to the first entry", () => {
      const ring = ringOf(10, "a", "b", "c");
      expect(ring.navigate(1)).toBe("b");
      expect(ring.navigate(1)).toBe("c");
      expect(ring.navigate(1)).toBe("a");
      expect(ring.position).toBe(0);
    });

    it("steps back and wraps to the last entry", () => {
      const ring = ringOf(10, "a", "b", "c");
      expect(ring.navigate(-1)).toBe("c");
      expect(ring.position).toBe(2);
      expect(ring.navigate(-1)).toBe("b");
    });

    it("returns to the same entry after a step and its reverse", () => {
      const ring = ringOf(10, "a", "b", "c");
      ring.navigate(1);
      expect(ring.navigate(1)).toBe("c");
      expect(ring.navigate(-1)).toBe("b");
    });

    it("wraps at both ends", () => {
      const ring = ringOf(10, "a", "b", "c");
      ring.navigate(-1);
      expect(ring.navigate(1)).toBe("a");
      expect(ring.navigate(-1)).toBe("c");
    });

    it("stays on the only entry", () => {
      const ring = ringOf(10, "a");
      expect(ring.navigate(1)).toBe("a");
      expect(ring.navigate(-1)).toBe("a");
    });

    it("returns nothing when empty", () => {
      const ring = new HistoryRing(5);
      expect(ring.navigate(1)).toBeUndefined();
      expect(ring.navigate(-1)).toBeUndefined();
    });
  });

  describe("persistence", () => {
    let dir: string;
    let file: string;

    beforeEach(() => {
      dir = makeTempDir();
      file = path.join(dir, "history.json");
    });

    afterEach(() => {
      removeDir(dir);
    });

    it.each([
      { label: "no entries", entries: [] },
      { label: "one entry", entries: ["(+ 1 2)"] },
      { label: "a full ring", entries: ["a", "(b\n c)", "\"d\""] },
    ])("round-trips $label", ({ entries }: { entries: string[] }) => {
      const ring = ringOf(3, ...entries);
      expect(ring.save(file)).toEqual({ tag: "Saved", path: file, count: entries.length });

      const restored = new HistoryRing(3);
      expect(restored.load(file)).toEqual({ tag: "Loaded", path: file, entries });
      expect(restored.entries()).toEqual(entries);
    });

    it("writes a JSON array and leaves no temp file", () => {
      ringOf(5, "x", "y").save(file);
      expect(fs.readFileSync(file, "utf8")).toBe("[\n  \"x\",\n  \"y\"\n]\n");
      expect(fs.readdirSync(dir)).toEqual(["history.json"]);
    });

    it("applies the bound before saving", () => {
      const ring = ringOf(2, "a", "b", "c");
      expect(ring.save(file)).toEqual({ tag: "Saved", path: file, count: 2 });
      expect(JSON.parse(fs.readFileSync(file, "utf8"))).toEqual(["a", "b"]);
    });

    it("applies the bound when loading", () => {
      fs.writeFileSync(file, JSON.stringify(["1", "2", "3", "4", "5"]));
      const ring = new HistoryRing(3);
      ring.load(file);
      expect(ring.entries()).toEqual(["1", "2", "3"]);
    });

    it("creates missing directories", () => {
      const nested = path.join(dir, "nested", "deeper", "history.json");
      expect(ringOf(5, "a").save(nested).tag).toBe("Saved");
      expect(JSON.parse(fs.readFileSync(nested, "utf8"))).toEqual(["a"]);
    });

    it("skips saving when the path cannot be written", () => {
      const blocker = path.join(dir, "afile");
      fs.writeFileSync(blocker, "");
      const target = path.join(blocker, "history.json");
      const ring = ringOf(5, "a");
      expect(ring.save(target)).toEqual({ tag: "Skipped", path: target, reason: "not writable" });
      expect(ring.entries()).toEqual(["a"]);
    });

    it("skips saving when the path is a directory", () => {
      expect(isWritable(dir)).toBe(false);
      expect(ringOf(5, "a").save(dir).tag).toBe("Skipped");
    });

    describe("with a directory that cannot be written", () => {
      const dirLocked = (target: string) => target !== dir;

      it("overwrites an existing writable file in place", () => {
        fs.writeFileSync(file, "[]\n");
        expect(planWrite(file, dirLocked)).toBe("in-place");
        expect(writeHistoryFile(file, ["a"], dirLocked)).toEqual({ tag: "Saved", path: file, count: 1 });
        expect(fs.readFileSync(file, "utf8")).toBe("[\n  \"a\"\n]\n");
        expect(fs.readdirSync(dir)).toEqual(["history.json"]);
      });

      it("skips a file that does not exist yet", () => {
        expect(planWrite(file, dirLocked)).toBeUndefined();
        expect(writeHistoryFile(file, ["a"], dirLocked)).toEqual({ tag: "Skipped", path: file, reason: "not writable" });
        expect(fs.existsSync(file)).toBe(false);
      });

      it("skips an existing file that is read-only as well", () => {
        fs.writeFileSync(file, "[]\n");
        expect(planWrite(file, () => false)).toBeUndefined();
        expect(fs.readFileSync(file, "utf8")).toBe("[]\n");
      });
    });

    it("replaces files in a writable directory", () => {
      expect(planWrite(file, () => true)).toBe("replace");
      fs.writeFileSync(file, "[]\n");
      expect(planWrite(file, () => true)).toBe("replace");
    });

    it("starts empty when the file is missing", () => {
      const ring = new HistoryRing(5);
      expect(ring.load(file)).toEqual({ tag: "Missing", path: file });
      expect(ring.size).toBe(0);
    });

    it("starts empty when the file is corrupt", () => {
      fs.writeFileSync(file, "{not json");
      const ring = ringOf(5, "old");
      const result = ring.load(file);
      expect(result.tag).toBe("Corrupt");
      expect(ring.size).toBe(0);
    });

    it("rejects files that are not an array of strings", () => {
      fs.writeFileSync(file, JSON.stringify({ a: 1 }));
      expect(readHistoryFile(file)).toEqual({
        tag: "Corrupt",
        path: file,
        reason: "expected an array of strings",
      });
      fs.writeFileSync(file, JSON.stringify(["a", 2]));
      expect(readHistoryFile(file).tag).toBe("Corrupt");
    });

    it("resets the cursor on load", () => {
      fs.writeFileSync(file, JSON.stringify(["a", "b"]));
      const ring = ringOf(5, "x", "y");
      ring.navigate(1);
      ring.load(file);
      expect(ring.position).toBe(0);
    });

    it("cleanup empties the ring and the file", () => {
      const ring = ringOf(5, "a", "b");
      ring.save(file);
      expect(ring.cleanup(file)).toEqual({ tag: "Saved", path: file, count: 0 });
      expect(ring.size).toBe(0);
      expect(JSON.parse(fs.readFileSync(file, "utf8"))).toEqual([]);
    });
  });
});
