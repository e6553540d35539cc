import { Server } from "http";
import { AppContext } from "../context.js";
import { createApp } from "./app.js";
import { openBrowser } from "./browser.js";

export interface WebServerOptions {
  host: string;
  port: number;
  open: boolean;
}

export function startWebServer(context: AppContext, options: WebServerOptions): Promise<Server> {
  const app = createApp(context);

  return new Promise((resolve, reject) => {
    const server = app.listen(options.port, options.host, () => {
      const url = `http://${options.host}:${options.port}`;
      context.logger.info(`Web UI listening on ${url}`);
      if (options.open && context.reports.loadSettings().autoOpenBrowser) {
        openBrowser(url, context.logger);
      }
      resolve(server);
    });
    server.on("error", reject);
  });
}
