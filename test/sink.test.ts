import { describe, it, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { Writable } from "stream";
import {
  BufferSurface,
  FileSurface,
  StreamSurface,
  chooseSurface,
  deliver,
} from "../src/sink.js";

describe("deliver", () => {
  it("writes a single-line message as one line", async () => {
    const surface = new BufferSurface();
    await deliver(surface, "feat: add login flow");
    expect(surface.lines).toEqual(["feat: add login flow"]);
  });

  it("splits multi-line messages", async () => {
    const surface = new BufferSurface();
    await deliver(surface, "feat: a\nfix: b");
    expect(surface.lines).toEqual(["feat: a", "fix: b"]);
  });

  it("replaces whatever the surface held before", async () => {
    const surface = new BufferSurface();
    surface.lines = ["# Please enter the commit message", "#"];
    await deliver(surface, "docs: fix typo");
    expect(surface.lines).toEqual(["docs: fix typo"]);
  });
});

describe("FileSurface", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  it("overwrites the file with the new lines", async () => {
    dir = await mkdtemp(join(tmpdir(), "commitline-sink-"));
    const path = join(dir, "COMMIT_EDITMSG");
    await writeFile(path, "# old template\n# more\n");

    await deliver(new FileSurface(path), "fix: handle empty input");

    expect(await readFile(path, "utf-8")).toBe("fix: handle empty input\n");
  });
});

describe("StreamSurface", () => {
  it("writes each line to the stream", async () => {
    const chunks: string[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    });

    await deliver(new StreamSurface(stream), "feat: a\nfix: b");

    expect(chunks.join("")).toBe("feat: a\nfix: b\n");
  });

  it("waits until a slow stream has taken the lines", async () => {
    const written: string[] = [];
    const slow = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        setTimeout(() => {
          written.push(chunk.toString());
          callback();
        }, 10);
      },
    });

    await deliver(new StreamSurface(slow), "perf: cache lookups");

    expect(written).toEqual(["perf: cache lookups\n"]);
  });

  it("rejects when the stream fails the write", async () => {
    const broken = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error("EPIPE"));
      },
    });
    broken.on("error", () => {});

    await expect(deliver(new StreamSurface(broken), "fix: x")).rejects.toThrow("EPIPE");
  });
});

describe("chooseSurface", () => {
  function stdoutStub(isTTY: boolean, chunks: string[] = []) {
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString());
        callback();
      },
    });
    return Object.assign(stream, { isTTY });
  }

  it("writes bare lines to a piped stdout", async () => {
    const chunks: string[] = [];
    const stdout = stdoutStub(false, chunks);

    const { target, plain } = chooseSurface({}, stdout);
    await deliver(target, "feat: add login flow");

    expect(plain).toBe(true);
    expect(target).toBeInstanceOf(StreamSurface);
    expect(chunks.join("")).toBe("feat: add login flow\n");
  });

  it("buffers the message for a terminal", () => {
    const { target, plain } = chooseSurface({}, stdoutStub(true));
    expect(plain).toBe(false);
    expect(target).toBeInstanceOf(BufferSurface);
  });

  it("prefers the --write file over a piped stdout", () => {
    const { target, plain } = chooseSurface({ write: "msg.txt" }, stdoutStub(false));
    expect(plain).toBe(false);
    expect(target).toBeInstanceOf(FileSurface);
  });

  it("leaves the --write file alone on a dry run", () => {
    const { target } = chooseSurface({ write: "msg.txt", dryRun: true }, stdoutStub(true));
    expect(target).toBeInstanceOf(BufferSurface);
  });
});
