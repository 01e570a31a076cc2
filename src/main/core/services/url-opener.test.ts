import { EventEmitter } from "node:events";
import { describe, expect, it, vi } from "vitest";
import { Logger } from "../logger";
import { openerFor, SystemUrlOpener } from "./url-opener";

class FakeChild extends EventEmitter {
  readonly unref = vi.fn();
}

describe("openerFor", () => {
  it("picks the desktop opener per platform", () => {
    expect(openerFor("win32", "https://example.com/")).toEqual({
      file: "cmd",
      args: ["/c", "start", "", "https://example.com/"]
    });
    expect(openerFor("darwin", "https://example.com/")).toEqual({ file: "open", args: ["https://example.com/"] });
    expect(openerFor("linux", "https://example.com/")).toEqual({ file: "xdg-open", args: ["https://example.com/"] });
  });
});

describe("SystemUrlOpener", () => {
  it("launches a detached opener for http(s) URLs", async () => {
    const child = new FakeChild();
    const spawn = vi.fn((_file: string, _args: string[]) => child);
    const opener = new SystemUrlOpener(new Logger(), { platform: "linux", spawn });

    await expect(opener.open("https://example.com/search?q=violin")).resolves.toEqual({
      ok: true,
      message: "Opening https://example.com/search?q=violin"
    });
    expect(spawn).toHaveBeenCalledWith(
      "xdg-open",
      ["https://example.com/search?q=violin"],
      expect.objectContaining({ detached: true })
    );
    expect(child.unref).toHaveBeenCalledTimes(1);
  });

  it("rejects malformed and non-web URLs", async () => {
    const spawn = vi.fn(() => new FakeChild());
    const opener = new SystemUrlOpener(new Logger(), { platform: "linux", spawn });

    await expect(opener.open("not a url")).resolves.toEqual({ ok: false, message: "Invalid URL." });
    await expect(opener.open("file:///etc/passwd")).resolves.toEqual({
      ok: false,
      message: "Only http/https URLs are allowed."
    });
    expect(spawn).not.toHaveBeenCalled();
  });

  it("reports a spawn failure", async () => {
    const opener = new SystemUrlOpener(new Logger(), {
      platform: "linux",
      spawn: () => {
        throw new Error("spawn xdg-open ENOENT");
      }
    });

    await expect(opener.open("https://example.com/")).resolves.toEqual({
      ok: false,
      message: "Unable to open the browser."
    });
  });
});
