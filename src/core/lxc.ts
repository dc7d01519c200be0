import * as crypto from "node:crypto";
import * as os from "node:os";
import * as path from "node:path";
import { EnvironmentProvisionFailure, NetworkingTimeout } from "./errors.js";
import type {
  EnvironmentHandle,
  EnvironmentProvisioner,
  EnvironmentSpec,
  LineSink,
  ProcessRunner,
} from "../types/index.js";

export const NETWORK_ATTEMPTS = 10;
export const NETWORK_INTERVAL_MS = 6000;
const NETWORK_PROBE = "curl -s --head http://archive.ubuntu.com > /dev/null";

export interface LxcProvisionerOptions {
  run: ProcessRunner;
  /** Image remote, combined with the release as "<image>:<release>" */
  image?: string;
  homeDir?: string;
  attempts?: number;
  intervalMs?: number;
  sleep?: (ms: number) => Promise<void>;
  makeName?: () => string;
  log?: LineSink;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

function randomName(): string {
  return `mptest-${crypto.randomBytes(3).toString("hex")}`;
}

/**
 * Throwaway LXD containers driven through the lxc client
 */
export class LxcProvisioner implements EnvironmentProvisioner {
  private readonly runProcess: ProcessRunner;
  private readonly image: string;
  private readonly homeDir: string;
  private readonly attempts: number;
  private readonly intervalMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly makeName: () => string;
  private readonly log: LineSink;

  constructor(options: LxcProvisionerOptions) {
    this.runProcess = options.run;
    this.image = options.image ?? "ubuntu";
    this.homeDir = options.homeDir ?? os.homedir();
    this.attempts = options.attempts ?? NETWORK_ATTEMPTS;
    this.intervalMs = options.intervalMs ?? NETWORK_INTERVAL_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.makeName = options.makeName ?? randomName;
    this.log = options.log ?? (() => {});
  }

  async provision(spec: EnvironmentSpec, onLine: LineSink = this.log): Promise<EnvironmentHandle> {
    const name = this.makeName();
    const image = `${this.image}:${spec.release}`;
    onLine(`Launching ${image} as ${name} ...`);
    const launch = await this.runProcess("lxc", ["launch", image, name], { capture: true });
    if (launch.code !== 0) {
      throw new EnvironmentProvisionFailure(`Could not launch ${image}: ${launch.output}`);
    }

    try {
      await this.waitForNetworking(name);
      const user = await this.capture(name, ["whoami"]);
      const home = await this.capture(name, ["pwd"]);
      const handle: EnvironmentHandle = {
        name,
        user,
        home,
        workspace: path.posix.join("/tmp", path.basename(spec.workspace)),
      };
      await this.pushWorkspace(handle, spec.workspace);
      return handle;
    } catch (error) {
      await this.teardown({ name, user: "", home: "", workspace: "" }, onLine);
      throw error;
    }
  }

  async run(handle: EnvironmentHandle, command: string, onLine?: LineSink): Promise<number> {
    const result = await this.exec(handle.name, ["sh", "-c", command], onLine);
    return result.code;
  }

  async teardown(handle: EnvironmentHandle, onLine: LineSink = this.log): Promise<void> {
    onLine(`Deleting ${handle.name}`);
    const result = await this.runProcess("lxc", ["delete", "--force", handle.name], { capture: true });
    if (result.code !== 0) {
      onLine(`Could not delete ${handle.name}: ${result.output}`);
    }
  }

  private exec(name: string, command: readonly string[], onLine?: LineSink) {
    return this.runProcess("lxc", ["exec", name, "--", ...command], { onLine });
  }

  private async capture(name: string, command: readonly string[]): Promise<string> {
    const result = await this.runProcess("lxc", ["exec", name, "--", ...command], { capture: true });
    if (result.code !== 0) {
      throw new EnvironmentProvisionFailure(`\`${command.join(" ")}\` failed in ${name}: ${result.output}`);
    }
    return result.output.trim();
  }

  private async waitForNetworking(name: string): Promise<void> {
    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      const probe = await this.exec(name, ["sh", "-c", NETWORK_PROBE]);
      if (probe.code === 0) return;
      if (attempt < this.attempts) await this.sleep(this.intervalMs);
    }
    const seconds = Math.round((this.attempts * this.intervalMs) / 1000);
    throw new NetworkingTimeout(`Networking did not come up in ${seconds} seconds`);
  }

  private async push(name: string, source: string, destination: string): Promise<void> {
    const result = await this.runProcess("lxc", ["file", "push", "-rp", source, `${name}${destination}`], {
      capture: true,
    });
    if (result.code !== 0) {
      throw new EnvironmentProvisionFailure(`Could not push ${source} to ${name}: ${result.output}`);
    }
  }

  private async pushWorkspace(handle: EnvironmentHandle, workspace: string): Promise<void> {
    await this.push(handle.name, workspace, "/tmp");
    await this.push(handle.name, path.join(this.homeDir, ".ssh"), handle.home);
    await this.push(handle.name, path.join(this.homeDir, ".gitconfig"), handle.home);
    // ssh refuses keys it does not own
    await this.capture(handle.name, ["chown", "-R", `${handle.user}:${handle.user}`, handle.home]);
  }
}
