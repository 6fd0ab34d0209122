/** Raw `bvproject.yaml` document shapes, as written on disk. */
export type EntrypointDocument = {
  name: string;
  command: string;
  workdir?: string;
  default?: boolean;
  [key: string]: unknown;
};

export type ProjectDocument = {
  name: string;
  version: string;
  entrypoints: EntrypointDocument[];
  venv_dir?: string;
  orchestrator?: { url?: string };
  [key: string]: unknown;
};
