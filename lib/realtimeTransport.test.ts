import { describe, expect, it, vi } from "vitest";

const { sockets, FakeWebSocket } = vi.hoisted(() => {
  const sockets: Array<{
    url: string;
    protocols?: unknown;
    binaryType: string;
    onopen: ((event: unknown) => void) | null;
    onmessage: ((event: unknown) => void) | null;
    onclose: ((event: unknown) => void) | null;
    onerror: ((event: unknown) => void) | null;
    send: (data: unknown) => void;
    close: (code?: number, reason?: string) => void;
  }> = [];

  class FakeWebSocket {
    static CONNECTING = 0;
    static OPEN = 1;
    static CLOSING = 2;
    static CLOSED = 3;

    readyState = 0;
    protocol = "";
    bufferedAmount = 0;
    binaryType = "blob";
    onopen: ((event: unknown) => void) | null = null;
    onmessage: ((event: unknown) => void) | null = null;
    onclose: ((event: unknown) => void) | null = null;
    onerror: ((event: unknown) => void) | null = null;
    send = vi.fn();
    close = vi.fn();
    addEventListener = vi.fn();
    removeEventListener = vi.fn();

    constructor(
      public url: string,
      public protocols?: unknown
    ) {
      sockets.push(this);
    }
  }

  return { sockets, FakeWebSocket };
});

vi.mock("undici", () => ({ WebSocket: FakeWebSocket }));

import { NodeRealtimeSocket } from "@/lib/realtimeTransport";

describe("NodeRealtimeSocket", () => {
  it("opens an undici socket and forwards handler events", () => {
    const socket = new NodeRealtimeSocket("ws://localhost:54321/realtime/v1/websocket", ["phoenix"]);
    const raw = sockets[sockets.length - 1];
    const onmessage = vi.fn();
    const onclose = vi.fn();
    socket.onmessage = onmessage;
    socket.onclose = onclose;

    raw.onmessage?.({ data: '{"event":"phx_reply"}' });
    raw.onclose?.({ code: 1000, reason: "" });

    expect(raw.url).toBe("ws://localhost:54321/realtime/v1/websocket");
    expect(raw.protocols).toEqual(["phoenix"]);
    expect(onmessage).toHaveBeenCalledWith({ data: '{"event":"phx_reply"}' });
    expect(onclose).toHaveBeenCalledWith({ code: 1000, reason: "" });
    expect(socket.OPEN).toBe(1);
    expect(NodeRealtimeSocket.CLOSED).toBe(3);
  });

  it("ignores events while no handler is set", () => {
    const socket = new NodeRealtimeSocket("ws://localhost:54321/realtime/v1/websocket");
    const raw = sockets[sockets.length - 1];

    expect(socket.readyState).toBe(0);
    expect(() => raw.onerror?.({ message: "connection refused" })).not.toThrow();
  });

  it("passes writes through and accepts only supported binary types", () => {
    const socket = new NodeRealtimeSocket("ws://localhost:54321/realtime/v1/websocket");
    const raw = sockets[sockets.length - 1];

    socket.binaryType = "arraybuffer";
    socket.binaryType = "nodebuffer";
    socket.send("heartbeat");
    socket.close(1000, "done");

    expect(raw.binaryType).toBe("arraybuffer");
    expect(raw.send).toHaveBeenCalledWith("heartbeat");
    expect(raw.close).toHaveBeenCalledWith(1000, "done");
  });
});
