/**
 * Project descriptor (the PROJECT file written by the scaffolding generator).
 */

export type ResourceDescriptor = {
  group: string;
  kind: string;
  version: string;
  /** Per-resource domain override, empty when the project domain applies */
  domain?: string;
  webhookDefaulting: boolean;
  webhookValidation: boolean;
};

export type ProjectDescriptor = {
  projectName: string;
  /** Go module path of the project (`repo:`) */
  repoModule: string;
  domain: string;
  multigroup: boolean;
  /** In file order */
  resources: ResourceDescriptor[];
};
