import { describe, it, expect } from "vitest";
import { isKnownCommand, parseCommand } from "../../../src/bot/commands";

describe("parseCommand", () => {
  it("parses a bare command", () => {
    expect(parseCommand("/list")).toEqual({ command: "list", args: "" });
  });

  it("lower-cases the command name", () => {
    expect(parseCommand("/Stats")).toEqual({ command: "stats", args: "" });
  });

  it("keeps spaces inside the argument", () => {
    expect(parseCommand("/delete my holiday photo.jpg")).toEqual({
      command: "delete",
      args: "my holiday photo.jpg",
    });
  });

  it("strips only the single separator after the command", () => {
    expect(parseCommand("/details  two  spaces ")).toEqual({
      command: "details",
      args: " two  spaces ",
    });
  });

  it("accepts a newline as the separator", () => {
    expect(parseCommand("/download\nnotes.txt")).toEqual({
      command: "download",
      args: "notes.txt",
    });
  });

  it("accepts a mention of this bot", () => {
    expect(parseCommand("/details@FileLedgerBot a.txt", "fileledgerbot")).toEqual({
      command: "details",
      args: "a.txt",
    });
  });

  it("ignores commands addressed to another bot", () => {
    expect(parseCommand("/list@OtherBot", "FileLedgerBot")).toBeNull();
  });

  it("ignores plain text", () => {
    expect(parseCommand("hello there")).toBeNull();
    expect(parseCommand("")).toBeNull();
  });
});

describe("isKnownCommand", () => {
  it("recognises the bot's commands", () => {
    expect(isKnownCommand("download")).toBe(true);
    expect(isKnownCommand("start")).toBe(true);
  });

  it("rejects anything else", () => {
    expect(isKnownCommand("rename")).toBe(false);
  });
});
