/** Configuration types — layered config system. */
import type { ArchConvention, DigestAlgorithm, FilenameConvention, LineFormat } from "./manifest.js";

export type RepositoryConfig = {
  url: string;
  checksum_file: string;
  algorithm: DigestAlgorithm;
  line_format: LineFormat;
  filename_convention: FilenameConvention;
  arch_convention: ArchConvention;
};

export type CloudImgConfig = {
  schema_version: string;
  user_agent?: string;
  repositories: Record<string, RepositoryConfig>;
};
