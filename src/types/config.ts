/** Tool settings, layered from config/base.yaml, config/<env>.yaml and BVPACK_* variables. */
export type BvpackSettings = {
  schema_version: string;
  /** Default output directory for `build`, relative to the project root. */
  dist_dir: string;
  /** Root of the local publish layout `<publish_dir>/<name>/<version>/`. */
  publish_dir: string;
  artifact_extension: string;
  compression_level?: number;
  /** Pre-resolved dependency lock to embed instead of running `pip freeze`. */
  lock_file?: string;
  /** Globs (archive paths) left out of every build. */
  exclude?: string[];
};
