/**
 * Wrapper over the external scaffolding tools: the Go toolchain and the
 * operator generator. Every call runs in an explicit directory and fails the
 * run on a non-zero exit.
 */

import type { ToolchainConfig } from "../config/zod-schema.js";
import type { ProjectDescriptor, ResourceDescriptor } from "../descriptor/types.js";
import { runChecked, type CommandRunner } from "../infra/exec.js";
import { createSubsystemLogger } from "../logging/subsystem.js";

const log = createSubsystemLogger("scaffold");

export type ScaffoldGenerator = {
  initModule: (dir: string, repoModule: string) => Promise<void>;
  initProject: (dir: string, project: ProjectDescriptor) => Promise<void>;
  enableMultigroup: (dir: string) => Promise<void>;
  createApi: (dir: string, resource: ResourceDescriptor) => Promise<void>;
  /** Returns false when the resource declares no webhook */
  createWebhook: (dir: string, resource: ResourceDescriptor) => Promise<boolean>;
  tidy: (dir: string) => Promise<void>;
};

export function initArgs(project: ProjectDescriptor, plugins: string): string[] {
  return [
    "init",
    `--domain=${project.domain}`,
    `--project-name=${project.projectName}`,
    `--plugins=${plugins}`,
  ];
}

function resourceFlags(resource: ResourceDescriptor): string[] {
  return [
    `--group=${resource.group}`,
    `--version=${resource.version}`,
    `--kind=${resource.kind}`,
  ];
}

export function apiArgs(resource: ResourceDescriptor): string[] {
  return ["create", "api", ...resourceFlags(resource), "--resource", "--controller"];
}

/** Undefined when neither defaulting nor validation is enabled. */
export function webhookArgs(resource: ResourceDescriptor): string[] | undefined {
  if (!resource.webhookDefaulting && !resource.webhookValidation) {
    return undefined;
  }
  const args = ["create", "webhook", ...resourceFlags(resource)];
  if (resource.webhookDefaulting) {
    args.push("--defaulting");
  }
  if (resource.webhookValidation) {
    args.push("--programmatic-validation");
  }
  return args;
}

export function createScaffoldGenerator(
  runner: CommandRunner,
  toolchain: ToolchainConfig,
): ScaffoldGenerator {
  const go = async (dir: string, args: string[]) => {
    log.debug("Running", { command: toolchain.go, args, cwd: dir });
    await runChecked(runner, toolchain.go, args, dir);
  };
  const generate = async (dir: string, args: string[]) => {
    log.debug("Running", { command: toolchain.generator, args, cwd: dir });
    await runChecked(runner, toolchain.generator, args, dir);
  };

  return {
    initModule: (dir, repoModule) => go(dir, ["mod", "init", repoModule]),
    initProject: (dir, project) => generate(dir, initArgs(project, toolchain.plugins)),
    enableMultigroup: (dir) => generate(dir, ["edit", "--multigroup=true"]),
    createApi: (dir, resource) => generate(dir, apiArgs(resource)),
    createWebhook: async (dir, resource) => {
      const args = webhookArgs(resource);
      if (!args) {
        return false;
      }
      await generate(dir, args);
      return true;
    },
    tidy: (dir) => go(dir, ["mod", "tidy"]),
  };
}
