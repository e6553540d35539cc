import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { dirname, join } from "path";
import { AppContext, createAppContext } from "./context.js";
import { TOOL_DEFINITIONS } from "./tools/definitions.js";
import { handleToolCall } from "./tools/handlers.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJson: { version: string } = JSON.parse(
  readFileSync(join(__dirname, "..", "package.json"), "utf-8")
);

/** MCP server exposing the work log over stdio. */
export class WorklogServer {
  private server: Server;
  private context: AppContext;

  private constructor(context: AppContext) {
    this.context = context;

    this.server = new Server(
      {
        name: "worklog",
        version: packageJson.version,
      },
      {
        capabilities: {
          tools: {},
        },
      }
    );

    this.setupHandlers();
  }

  static async create(): Promise<WorklogServer> {
    // stdout belongs to the MCP transport; log to the file only.
    const context = await createAppContext({ quiet: true });
    return new WorklogServer(context);
  }

  private setupHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: TOOL_DEFINITIONS,
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;
      this.context.logger.debug(`MCP tool call: ${name}`);
      return handleToolCall(name, args, this.context);
    });
  }

  async run(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    this.context.logger.info("Worklog MCP server running on stdio");
  }

  close(): void {
    this.context.store.close();
  }
}

export async function runMcpServer(): Promise<void> {
  const server = await WorklogServer.create();
  const shutdown = () => {
    server.close();
    process.exit(0);
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
  await server.run();
}
