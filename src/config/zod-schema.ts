import { z } from "zod";

const ToolchainSchema = z
  .object({
    /** Go toolchain binary */
    go: z.string().min(1).default("go"),
    /** Scaffolding generator binary */
    generator: z.string().min(1).default("operator-sdk"),
    /** Generator plugin for the new layout */
    plugins: z.string().min(1).default("go/v4"),
  })
  .strict();

const LayoutSchema = z
  .object({
    oldControllerDir: z.string().min(1).default("controllers"),
    newControllerDir: z.string().min(1).default("internal/controller"),
    oldPackage: z.string().min(1).default("controllers"),
    newPackage: z.string().min(1).default("controller"),
    oldSharedDir: z.string().min(1).default("pkg"),
    newSharedDir: z.string().min(1).default("internal"),
    oldEntryPoint: z.string().min(1).default("main.go"),
    newEntryPoint: z.string().min(1).default("cmd/main.go"),
  })
  .strict();

const ReconcilerFieldSchema = z
  .object({
    name: z.string().min(1),
    value: z.string().min(1),
  })
  .strict();

const EntryPointSchema = z
  .object({
    scalarField: z.string().min(1).default("LeaderElectionID"),
    setupStart: z.string().min(1).default("cfg, err := config.GetConfig()"),
    setupEnd: z.string().min(1).default("kclient, err := kubernetes.NewForConfig(cfg)"),
    managerStart: z.string().min(1).default("mgr, err := ctrl.NewManager"),
    reconcilerFields: z
      .array(ReconcilerFieldSchema)
      .min(1)
      .default([
        { name: "Client", value: "mgr.GetClient()" },
        { name: "Scheme", value: "mgr.GetScheme()" },
        { name: "Kclient", value: "kclient" },
      ]),
    defaultSetupArgs: z.string().min(1).default("mgr"),
  })
  .strict();

const ApiSchema = z
  .object({
    /** Requirements written into a freshly created api/go.mod */
    defaultRequires: z.record(z.string(), z.string()).default({
      "k8s.io/apimachinery": "v0.31.0",
      "sigs.k8s.io/controller-runtime": "v0.19.0",
    }),
  })
  .strict();

const ExtrasSchema = z
  .object({
    copyFiles: z
      .array(z.string())
      .default([".gitignore", "README.md", "LICENSE", "Dockerfile", ".dockerignore"]),
    copyDirs: z.array(z.string()).default(["templates", "scripts", "hack", "config/manifests/bases"]),
    removePaths: z.array(z.string()).default([".github/workflows", ".golangci.yml", ".devcontainer"]),
  })
  .strict();

const ReconcileSchema = z
  .object({
    protectedFiles: z
      .array(z.string())
      .default(["OWNERS", "OWNERS_ALIASES", "LICENSE.txt", "kuttl-test.json", "renovate.json", "Makefile"]),
    protectedDirs: z
      .array(z.string())
      .default(["zuul.d", ".github", "config/samples", "test", "internal"]),
    overlayExcludes: z.array(z.string()).default([".golangci.yml"]),
    fixturesDir: z
      .object({
        from: z.string().min(1).default("tests"),
        to: z.string().min(1).default("test"),
      })
      .strict()
      .default({}),
    /** Stripped from the repository basename to find the legacy shared package */
    operatorSuffix: z.string().default("-operator"),
  })
  .strict();

export const RescaffoldConfigSchema = z
  .object({
    /** The new project lands in `<project>-<targetSuffix>` */
    targetSuffix: z.string().min(1).default("v4"),
    snapshotSuffix: z
      .string()
      .regex(/^\.[\w.-]+$/, "must start with a dot")
      .default(".snapshot"),
    toolchain: ToolchainSchema.default({}),
    layout: LayoutSchema.default({}),
    entryPoint: EntryPointSchema.default({}),
    api: ApiSchema.default({}),
    extras: ExtrasSchema.default({}),
    reconcile: ReconcileSchema.default({}),
  })
  .strict();

export type RescaffoldConfig = z.infer<typeof RescaffoldConfigSchema>;
export type ToolchainConfig = RescaffoldConfig["toolchain"];
export type LayoutConfig = RescaffoldConfig["layout"];
export type EntryPointConfig = RescaffoldConfig["entryPoint"];
export type ReconcileConfig = RescaffoldConfig["reconcile"];
export type ReconcilerField = z.infer<typeof ReconcilerFieldSchema>;
