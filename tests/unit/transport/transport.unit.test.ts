import { describe, it, expect, vi, afterEach } from "vitest";
import { EventEmitter } from "node:events";

class StalledSocket extends EventEmitter {
  setTimeout = vi.fn();
  write = vi.fn();
  destroy = vi.fn();
}

const sockets = vi.hoisted(() => {
  const created: StalledSocket[] = [];
  return { created };
});

vi.mock("node:net", () => {
  const createConnection = vi.fn(() => {
    const socket = new StalledSocket();
    sockets.created.push(socket);
    return socket;
  });
  return { default: { createConnection }, createConnection };
});

describe("transport", () => {
  afterEach(() => {
    sockets.created.length = 0;
  });

  it("should report a connect timeout when the peer never accepts", async () => {
    const { exchange } = await import("../../../src/transport/transport");

    const pending = exchange({
      host: "10.0.0.1",
      port: 8080,
      request: Buffer.from("GET / HTTP/1.1\r\n\r\n"),
      timeoutMs: 50,
    });

    const [socket] = sockets.created;
    expect(socket?.setTimeout).toHaveBeenCalledWith(50);
    socket?.emit("timeout");

    await expect(pending).resolves.toEqual({
      type: "error",
      stage: "connect",
      code: "ETIMEDOUT",
      message: "Connection to 10.0.0.1:8080 timed out after 50ms",
      response: Buffer.alloc(0),
    });
    expect(socket?.write).not.toHaveBeenCalled();
    expect(socket?.destroy).toHaveBeenCalledTimes(1);
  });
});
