import { promises as fs } from "fs";
import path from "path";
import {
  DependencyResolutionFailedError,
  DownloadFailedError,
  InstallFailedError,
  errorMessage
} from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import { tailLines, type CommandResult, type CommandRunner, type CommandSpec } from "../execution/commandRunner.js";
import { condaPackages, pipPackages, type EnvironmentSpec } from "../spec/environmentSpec.js";
import type { Fingerprint } from "../spec/fingerprint.js";
import type { MaterializedEnvironment } from "./environment.js";

export const DEFAULT_INSTALLER_URL = "https://repo.anaconda.com/miniconda/Miniconda3-latest-Linux-x86_64.sh";

/** Capability that turns a spec file into an installed environment prefix. */
export interface Installer {
  installBaseRuntime(): Promise<void>;
  createEnvironment(specFile: string, name: string): Promise<string>;
}

export interface CondaInstallerOptions {
  runner: CommandRunner;
  /** Where the base runtime is installed, on instance-local scratch. */
  condaRoot: string;
  installerUrl?: string;
  useMamba?: boolean;
  solverChannels?: string[];
  logger?: Logger;
}

const RESOLUTION_FAILURE_PATTERNS = [
  /ResolvePackageNotFound/,
  /PackagesNotFoundError/,
  /UnsatisfiableError/,
  /Could not solve for environment specs/i,
  /nothing provides/i,
  /conflicting requests/i,
  /No matching distribution found/i
];

export function isResolutionFailure(output: string): boolean {
  return RESOLUTION_FAILURE_PATTERNS.some((re) => re.test(output));
}

function failureDetail(result: CommandResult): string {
  const tail = tailLines(result.stderr.trim() ? result.stderr : result.stdout);
  return `exit ${result.exitCode}${tail ? `\n${tail}` : ""}`;
}

/**
 * Miniconda + conda/mamba driven through a CommandRunner. Every step is blocking and is never
 * retried here; a failed step fails the build.
 */
export class CondaInstaller implements Installer {
  private readonly installerUrl: string;
  private readonly useMamba: boolean;
  private readonly solverChannels: string[];
  private readonly logger: Logger;

  constructor(private readonly options: CondaInstallerOptions) {
    this.installerUrl = options.installerUrl ?? DEFAULT_INSTALLER_URL;
    this.useMamba = options.useMamba ?? true;
    this.solverChannels = options.solverChannels ?? ["conda-forge"];
    this.logger = options.logger ?? silentLogger;
  }

  get condaRoot(): string {
    return this.options.condaRoot;
  }

  private condaEnv(): Record<string, string> {
    return {
      CONDA_PKGS_DIRS: path.join(this.condaRoot, "pkgs"),
      CONDA_ENVS_PATH: path.join(this.condaRoot, "envs")
    };
  }

  private async exec(spec: CommandSpec): Promise<CommandResult | Error> {
    this.logger.debug("running command", { argv: spec.argv });
    try {
      return await this.options.runner.run(spec);
    } catch (err) {
      return err instanceof Error ? err : new Error(String(err));
    }
  }

  private async download(dest: string): Promise<void> {
    const res = await this.exec({ argv: ["curl", "-fsSL", "--output", dest, this.installerUrl] });
    if (res instanceof Error) {
      throw new DownloadFailedError(`downloading ${this.installerUrl} failed: ${res.message}`, { cause: res });
    }
    if (res.exitCode !== 0) {
      throw new DownloadFailedError(`downloading ${this.installerUrl} failed: ${failureDetail(res)}`);
    }
  }

  private async install(step: string, spec: CommandSpec): Promise<void> {
    const res = await this.exec(spec);
    if (res instanceof Error) throw new InstallFailedError(`${step} failed: ${res.message}`, { cause: res });
    if (res.exitCode !== 0) throw new InstallFailedError(`${step} failed: ${failureDetail(res)}`);
  }

  async installBaseRuntime(): Promise<void> {
    const scratchDir = path.dirname(this.condaRoot);
    await fs.mkdir(scratchDir, { recursive: true });
    const installerPath = path.join(scratchDir, path.basename(new URL(this.installerUrl).pathname) || "miniconda.sh");

    this.logger.info("installing base runtime", { url: this.installerUrl, conda_root: this.condaRoot });
    await this.download(installerPath);
    await this.install("base runtime install", { argv: ["bash", installerPath, "-b", "-p", this.condaRoot] });

    if (this.useMamba) {
      const channels = this.solverChannels.flatMap((c) => ["-c", c]);
      await this.install("solver install", {
        argv: [path.join(this.condaRoot, "bin", "conda"), "install", "-y", "-n", "base", ...channels, "mamba"],
        env: this.condaEnv()
      });
    }
  }

  async createEnvironment(specFile: string, name: string): Promise<string> {
    const prefix = path.join(this.condaRoot, "envs", name);
    const solver = path.join(this.condaRoot, "bin", this.useMamba ? "mamba" : "conda");

    const res = await this.exec({
      argv: [solver, "env", "create", "--quiet", "--file", specFile, "--prefix", prefix],
      env: this.condaEnv()
    });
    if (res instanceof Error) {
      throw new InstallFailedError(`environment create failed: ${res.message}`, { cause: res });
    }
    if (res.exitCode !== 0) {
      const detail = failureDetail(res);
      if (isResolutionFailure(`${res.stdout}\n${res.stderr}`)) {
        throw new DependencyResolutionFailedError(`dependencies of ${name} could not be resolved: ${detail}`);
      }
      throw new InstallFailedError(`environment create failed: ${detail}`);
    }
    return prefix;
  }
}

export interface EnvironmentBuilderOptions {
  installer: Installer;
  scratchDir: string;
  logger?: Logger;
}

export interface Builder {
  build(spec: EnvironmentSpec, fingerprint: Fingerprint): Promise<MaterializedEnvironment>;
}

export class EnvironmentBuilder implements Builder {
  private readonly logger: Logger;

  constructor(private readonly options: EnvironmentBuilderOptions) {
    this.logger = options.logger ?? silentLogger;
  }

  async build(spec: EnvironmentSpec, fingerprint: Fingerprint): Promise<MaterializedEnvironment> {
    // Build from the fingerprinted bytes, not from the spec path, which may have been edited since.
    const specDir = path.join(this.options.scratchDir, "spec");
    const specFile = path.join(specDir, `${spec.name}.yaml`);
    try {
      await fs.mkdir(specDir, { recursive: true });
      await fs.writeFile(specFile, spec.bytes);
    } catch (err) {
      throw new InstallFailedError(`staging spec into ${specDir} failed: ${errorMessage(err)}`, { cause: err });
    }

    this.logger.info("building environment", {
      spec_name: spec.name,
      fingerprint,
      conda_packages: condaPackages(spec).length,
      pip_packages: pipPackages(spec).length
    });

    await this.options.installer.installBaseRuntime();
    const prefix = await this.options.installer.createEnvironment(specFile, spec.name);
    return { name: spec.name, prefix, fingerprint, origin: "built" };
  }
}
