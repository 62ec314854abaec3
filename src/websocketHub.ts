import { randomUUID } from "crypto";

import { RawData, WebSocket, WebSocketServer } from "ws";

import { describeError } from "./errors.js";
import { StatePublisher } from "./transport.js";
import { AttributeUpdate, CommandResult, PairingResult, SocketRequest, WebsocketPush, socketRequestSchema } from "./types.js";

export interface HubRequestHandler {
  handle(request: SocketRequest, clientId: string): Promise<CommandResult | PairingResult>;
  onClientDisconnect(clientId: string): void;
}

function decode(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf-8");
  }
  if (Buffer.isBuffer(data)) {
    return data.toString("utf-8");
  }
  return Buffer.from(data).toString("utf-8");
}

export class WebsocketHub implements StatePublisher {
  private readonly clients = new Map<WebSocket, string>();

  constructor(
    private readonly wss: WebSocketServer,
    private readonly handler?: HubRequestHandler
  ) {
    this.wss.on("connection", (socket) => this.handleConnection(socket));
  }

  get clientCount(): number {
    return this.clients.size;
  }

  publish(deviceId: string, attributes: AttributeUpdate): void {
    this.broadcast({ type: "attributes", deviceId, attributes });
  }

  broadcast(payload: WebsocketPush): void {
    const message = JSON.stringify(payload);
    for (const client of this.clients.keys()) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(message);
      }
    }
  }

  private handleConnection(socket: WebSocket): void {
    const clientId = randomUUID();
    this.clients.set(socket, clientId);
    socket.on("message", (data) => this.handleMessage(socket, clientId, data));
    socket.on("close", () => {
      this.clients.delete(socket);
      this.handler?.onClientDisconnect(clientId);
    });
  }

  private handleMessage(socket: WebSocket, clientId: string, data: RawData): void {
    if (!this.handler) {
      return;
    }
    let request: SocketRequest;
    try {
      const parsed = socketRequestSchema.safeParse(JSON.parse(decode(data)));
      if (!parsed.success) {
        this.send(socket, { type: "error", error: parsed.error.issues.map((issue) => issue.message).join("; ") });
        return;
      }
      request = parsed.data;
    } catch (error) {
      this.send(socket, { type: "error", error: `invalid message: ${describeError(error)}` });
      return;
    }
    this.handler
      .handle(request, clientId)
      .then((result) => this.send(socket, { type: "result", requestId: request.requestId, result }))
      .catch((error) => this.send(socket, { type: "error", requestId: request.requestId, error: describeError(error) }));
  }

  private send(socket: WebSocket, payload: WebsocketPush): void {
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(JSON.stringify(payload));
    }
  }
}
