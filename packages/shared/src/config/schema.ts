import { z } from 'zod';

/**
 * Project coordinates, normally supplied by the build that produced the artifacts.
 */
export const ProjectConfigSchema = z.object({
  artifactId: z.string().min(1).optional(),
  /** Quote it in YAML: an unquoted `1.0` is read as a number. */
  version: z.string().min(1).optional(),
  /** Site URL linked from README.html */
  url: z.string().optional(),
});

export const ScmConfigSchema = z.object({
  /** e.g. `scm:svn:https://svn.example.org/repos/dist/dev/foo` */
  stagingUrl: z.string().optional(),
  /** e.g. `scm:svn:https://svn.example.org/repos/dist/release/foo` */
  releaseUrl: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
  /** Environment variable holding the password, read when `password` is unset */
  password_env: z.string().optional(),
  svnExecutable: z.string().min(1).default('svn'),
});

/**
 * Relative paths resolve against the base directory of the run.
 * Unset directories derive from `buildDirectory` and `workingDirectory`.
 */
export const PathsConfigSchema = z.object({
  buildDirectory: z.string().min(1).default('target'),
  workingDirectory: z.string().min(1).optional(),
  checkoutDirectory: z.string().min(1).optional(),
  stagingCheckoutDirectory: z.string().min(1).optional(),
  releaseCheckoutDirectory: z.string().min(1).optional(),
  siteDirectory: z.string().min(1).optional(),
  releaseNotes: z.string().min(1).default('RELEASE-NOTES.txt'),
});

export const TemplatesConfigSchema = z.object({
  /** Directory holding HEADER.html and/or README.html overrides */
  directory: z.string().min(1).optional(),
});

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  project: ProjectConfigSchema.default({}),
  /** The run is a no-op unless the module is flagged as a distribution module. */
  distModule: z.boolean().default(false),
  /** Check out, stage and log, but never add or commit. */
  dryRun: z.boolean().default(false),
  scm: ScmConfigSchema.default({}),
  paths: PathsConfigSchema.default({}),
  templates: TemplatesConfigSchema.default({}),
});

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type ScmConfig = z.infer<typeof ScmConfigSchema>;
export type PathsConfig = z.infer<typeof PathsConfigSchema>;
export type TemplatesConfig = z.infer<typeof TemplatesConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial configuration as read from a YAML file or built from CLI flags, before validation.
 */
export type ConfigInput = z.input<typeof ConfigSchema>;
