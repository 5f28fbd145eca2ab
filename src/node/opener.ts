import { spawn } from "child_process";
import type { ArtifactLocation, Opener } from "#/core";
import { getLogger } from "#/logger";

const log = getLogger("opener");

function openCommand(platform: NodeJS.Platform, url: string): [string, string[]] {
  switch (platform) {
    case "darwin":
      return ["open", [url]];
    case "win32":
      return ["cmd", ["/c", "start", "", url]];
    default:
      return ["xdg-open", [url]];
  }
}

/**
 * Opens artifact locations with the desktop's default handler.
 */
export class SystemOpener implements Opener {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  open(location: ArtifactLocation): void {
    const [command, args] = openCommand(this.platform, location.url);
    const child = spawn(command, args, { detached: true, stdio: "ignore" });
    child.on("error", (err) => {
      log.warn({ err, url: location.url }, "Could not open artifact");
    });
    child.unref();
  }
}
