/**
 * Engine facade
 *
 * Ties the project session, installed package registry, command builder,
 * runner and output scanner together behind one session handle.
 */

import type { EngineContext } from "#/core";
import type { EngineConfig, EngineConfigInput } from "#/schemas";
import { defaultEngineConfig, findConfigFile, loadEngineConfig } from "#/config";
import { InvalidConfigError } from "#/errors";
import { ProjectSession, type ProjectState } from "#/project";
import type { PackageRecord } from "#/manifest";
import { PackageRegistry } from "#/registry";
import { latestVersion } from "#/version";
import { resolveTarget } from "#/targets";
import {
  buildCommand,
  finalizeCommand,
  getOperation,
  validateFlags,
  type Command,
} from "#/command";
import { ProcessRunner } from "#/runner";
import { OutputScanner } from "#/output";
import { locateBuildTool } from "./tool";

export interface RunOperationOptions {
  /** Directory to locate the project from */
  startDir: string;
  /** Narrows the target candidates offered for target-scoped operations */
  fragment?: string;
  /** Flags from the operation's catalogue entry */
  flags?: string[];
  /** Extra arguments, quoted like the rest */
  args?: string[];
  /** Extra arguments appended without quoting */
  verbatimArgs?: string[];
}

export class HstackEngine {
  readonly session: ProjectSession;
  readonly runner: ProcessRunner;
  readonly scanner: OutputScanner;
  private registry: PackageRegistry | undefined;
  private resolvedTool: string | undefined;

  constructor(
    private readonly context: EngineContext,
    readonly config: EngineConfig
  ) {
    this.session = new ProjectSession(context.fs);
    this.runner = new ProcessRunner(context.launcher);
    this.scanner = new OutputScanner(context.opener, {
      openCoverage: config.openCoverage,
      openHaddock: config.openHaddock,
    });
    // Printed artifact paths are relative to where the process ran
    this.scanner.attach(this.runner, (event) => event.command.workingDirectory);
  }

  /**
   * Path of the build tool. Looked up once; throws ExternalToolMissingError.
   */
  ensureTool(): string {
    if (!this.resolvedTool) {
      this.resolvedTool = locateBuildTool(this.context.fs, this.config.toolPath, this.context.env["PATH"]);
    }
    return this.resolvedTool;
  }

  prepare(startDir: string): ProjectState {
    return this.session.prepare(startDir);
  }

  selectPackage(name: string): PackageRecord {
    return this.session.selectPackage(name);
  }

  listInstalledPackages(): string[] {
    return this.installed().listInstalledPackages();
  }

  listInstalledVersions(name: string): string[] {
    return this.installed().listVersions(name);
  }

  latestInstalledVersion(name: string): string | null {
    return latestVersion(this.installed().listVersions(name));
  }

  refreshInstalledPackages(): void {
    this.installed().refresh();
  }

  /**
   * Build and launch an operation against the current package.
   * Resolves with the command as launched; the process itself runs on.
   */
  async runOperation(name: string, options: RunOperationOptions): Promise<Command> {
    const operation = getOperation(name);
    const flags = options.flags ?? [];
    validateFlags(operation, flags);

    const toolPath = this.ensureTool();
    const state = this.session.prepare(options.startDir);
    const pkg = state.currentPackage;
    // A package without a name (unreadable manifest) cannot be addressed
    const packageName = pkg?.name || undefined;

    let scopeArgs: Array<string | undefined> = [];
    let workingDirectory = pkg?.directory ?? state.rootDirectory;

    switch (operation.scope) {
      case "target": {
        if (pkg && packageName) {
          const target = await resolveTarget(pkg, {
            fragment: options.fragment,
            autoMode: this.config.autoTarget,
            prompter: this.context.prompter,
          });
          this.session.recordSelection({ lastTarget: target });
          scopeArgs = [target];
        }
        break;
      }
      case "package":
        scopeArgs = [packageName];
        break;
      case "directory":
        break;
      case "project":
        workingDirectory = state.rootDirectory;
        break;
    }
    this.session.recordSelection({ flags });

    const command = buildCommand({
      toolPath,
      operation: operation.name,
      args: [...scopeArgs, ...flags, ...(options.args ?? [])],
      verbatimArgs: options.verbatimArgs,
      workingDirectory,
      packageName,
    });
    const finalCommand = await finalizeCommand(command, {
      editBeforeRun: this.config.editBeforeRun,
      prompter: this.context.prompter,
    });

    this.runner.run(finalCommand);
    return finalCommand;
  }

  private installed(): PackageRegistry {
    if (!this.registry) {
      this.registry = new PackageRegistry(this.context.shell, this.ensureTool(), this.config.registryArgs);
    }
    return this.registry;
  }
}

/**
 * Create an engine from explicit configuration values.
 */
export function createEngine(context: EngineContext, config: EngineConfigInput = {}): HstackEngine {
  return new HstackEngine(context, defaultEngineConfig(config));
}

/**
 * Create an engine configured by the closest `.hstack.yaml` above `startDir`.
 * Throws InvalidConfigError when the file does not validate.
 */
export function createEngineForDirectory(context: EngineContext, startDir: string): HstackEngine {
  const configPath = findConfigFile(context.fs, startDir);
  if (!configPath) {
    return createEngine(context);
  }

  const result = loadEngineConfig(context.fs, configPath);
  if (!result.success) {
    throw new InvalidConfigError(result.error.message, result.error.details);
  }
  return new HstackEngine(context, result.data);
}
