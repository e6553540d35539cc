import { ChildProcess, spawn } from "child_process";
import { Logger } from "../logger.js";

export function browserCommand(url: string, platform: NodeJS.Platform = process.platform): [string, string[]] {
  if (platform === "darwin") return ["open", [url]];
  if (platform === "win32") return ["cmd", ["/c", "start", "", url]];
  return ["xdg-open", [url]];
}

/** Opens the URL in the default browser on a detached child. */
export function openBrowser(url: string, logger: Logger): ChildProcess {
  const [command, args] = browserCommand(url);
  const child = spawn(command, args, {
    detached: true,
    stdio: "ignore",
  });

  child.on("error", (error) => {
    logger.warn(`Could not open browser with ${command}: ${error.message}`);
  });

  child.unref();
  return child;
}
