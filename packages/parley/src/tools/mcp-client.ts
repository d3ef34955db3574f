// MCP client over Streamable HTTP, connected lazily on first use.

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";

/**
 * The slice of an MCP client the trends tool needs.
 */
export interface McpToolCaller {
  callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<unknown>;
  ping(signal?: AbortSignal): Promise<void>;
  close(): Promise<void>;
}

export interface McpHttpClientOptions {
  url: string;
  headers?: Record<string, string>;
  /** Per-request timeout passed to the SDK */
  timeoutMs?: number;
  clientName?: string;
}

export class McpHttpClient implements McpToolCaller {
  private client: Client | undefined;
  private connecting: Promise<Client> | undefined;

  constructor(private readonly options: McpHttpClientOptions) {}

  private connect(): Promise<Client> {
    if (this.client) return Promise.resolve(this.client);
    if (!this.connecting) {
      this.connecting = this.open().finally(() => {
        this.connecting = undefined;
      });
    }
    return this.connecting;
  }

  private async open(): Promise<Client> {
    const client = new Client({ name: this.options.clientName ?? "parley", version: "1.0.0" });
    const transport = new StreamableHTTPClientTransport(new URL(this.options.url), {
      requestInit: { headers: this.options.headers },
    });
    await client.connect(transport);
    this.client = client;
    return client;
  }

  async callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<unknown> {
    const client = await this.connect();
    return client.callTool({ name, arguments: args }, undefined, {
      signal,
      timeout: this.options.timeoutMs,
    });
  }

  async ping(signal?: AbortSignal): Promise<void> {
    const client = await this.connect();
    await client.ping({ signal, timeout: this.options.timeoutMs });
  }

  async close(): Promise<void> {
    const client = this.client;
    this.client = undefined;
    if (client) {
      await client.close();
    }
  }
}
