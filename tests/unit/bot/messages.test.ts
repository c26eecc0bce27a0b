import { describe, it, expect } from "vitest";
import { fileListTexts, packMessages } from "../../../src/bot/messages";
import { makeRecord } from "../../helpers/factories";

describe("packMessages", () => {
  it("joins blocks with a blank line while they fit", () => {
    expect(packMessages(["aaaa", "bbbb", "cc"], 10)).toEqual(["aaaa\n\nbbbb", "cc"]);
  });

  it("keeps a single short block as one message", () => {
    expect(packMessages(["only"], 10)).toEqual(["only"]);
  });

  it("cuts a block longer than the limit", () => {
    expect(packMessages(["abcdefghijkl"], 5)).toEqual(["abcde", "fghij", "kl"]);
  });

  it("returns nothing for no blocks", () => {
    expect(packMessages([], 10)).toEqual([]);
  });
});

describe("fileListTexts", () => {
  it("returns the empty state as one message", () => {
    expect(fileListTexts([])).toEqual([
      "📂 No files found.\n\nSend me a document to record your first file!",
    ]);
  });

  it("fits a short list into one message", () => {
    const texts = fileListTexts([
      makeRecord({ id: 1, fileName: "a.txt", fileSize: 10, mimeType: null }),
    ]);

    expect(texts).toHaveLength(1);
    expect(texts[0]?.split("\n").slice(0, 5)).toEqual([
      "📂 *Your Files* (1 file, 10 B total):",
      "",
      "1. a.txt",
      "   📊 Size: 10 B | 🎯 Type: Unknown",
      "   📅 Uploaded: 2024-03-05",
    ]);
  });
});
