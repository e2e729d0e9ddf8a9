import { spawn } from "node:child_process";

export interface LaunchCommand {
  command: string;
  args: string[];
}

/** Runs a command and resolves with its exit status. */
export type Launcher = (command: LaunchCommand) => Promise<number | null>;

export function resolveOpenCommand(url: string, platform: NodeJS.Platform): LaunchCommand {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "win32":
      // No shell sees the url, so `&` and `|` in a query string stay literal.
      return { command: "rundll32", args: ["url.dll,FileProtocolHandler", url] };
    default:
      return { command: "xdg-open", args: [url] };
  }
}

export const spawnLauncher: Launcher = ({ command, args }) => {
  return new Promise<number | null>((resolve, reject) => {
    const child = spawn(command, args, { stdio: "ignore" });
    child.once("error", reject);
    child.once("exit", (code) => resolve(code));
  });
};

/**
 * Hands `url` to the platform's default handler. Resolves `false` when the
 * launcher is missing or exits with a non-zero status.
 */
export async function openUrl(
  url: string,
  platform: NodeJS.Platform = process.platform,
  launch: Launcher = spawnLauncher
): Promise<boolean> {
  const command = resolveOpenCommand(url, platform);

  try {
    return (await launch(command)) === 0;
  } catch (error) {
    console.error(`Failed to launch ${command.command}`, error);
    return false;
  }
}
