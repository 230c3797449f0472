import type { WebSocketLike } from "@supabase/supabase-js";
import { WebSocket } from "undici";

/**
 * Realtime socket for Node 20, which has no global WebSocket. Wraps undici's
 * client and re-dispatches its events through the browser-style handlers the
 * realtime client assigns.
 */
export class NodeRealtimeSocket implements WebSocketLike {
  static readonly CONNECTING = WebSocket.CONNECTING;
  static readonly OPEN = WebSocket.OPEN;
  static readonly CLOSING = WebSocket.CLOSING;
  static readonly CLOSED = WebSocket.CLOSED;

  readonly CONNECTING = WebSocket.CONNECTING;
  readonly OPEN = WebSocket.OPEN;
  readonly CLOSING = WebSocket.CLOSING;
  readonly CLOSED = WebSocket.CLOSED;

  onopen: WebSocketLike["onopen"] = null;
  onmessage: WebSocketLike["onmessage"] = null;
  onclose: WebSocketLike["onclose"] = null;
  onerror: WebSocketLike["onerror"] = null;

  private readonly socket: InstanceType<typeof WebSocket>;

  constructor(address: string | URL, subprotocols?: string | string[]) {
    this.socket = new WebSocket(address, subprotocols);
    this.socket.onopen = (event) => this.onopen?.call(this, event);
    this.socket.onmessage = (event) => this.onmessage?.call(this, event);
    this.socket.onclose = (event) => this.onclose?.call(this, event);
    this.socket.onerror = (event) => this.onerror?.call(this, event);
  }

  get readyState() {
    return this.socket.readyState;
  }

  get url() {
    return this.socket.url;
  }

  get protocol() {
    return this.socket.protocol;
  }

  get bufferedAmount() {
    return this.socket.bufferedAmount;
  }

  get binaryType(): string {
    return this.socket.binaryType;
  }

  set binaryType(value: string) {
    if (value === "blob" || value === "arraybuffer") {
      this.socket.binaryType = value;
    }
  }

  send(data: string | ArrayBufferLike | Blob | ArrayBufferView) {
    this.socket.send(data);
  }

  close(code?: number, reason?: string) {
    this.socket.close(code, reason);
  }

  addEventListener(type: string, listener: (event: Event) => void) {
    this.socket.addEventListener(type, listener);
  }

  removeEventListener(type: string, listener: (event: Event) => void) {
    this.socket.removeEventListener(type, listener);
  }
}
