// ---------------------------------------------------------------------------
// Shared domain types.
//
// Definition types describe the config as written (templated, wildcarded).
// Locked types describe the resolved lock; the lock builder produces them
// and the script generator only reads them.
// ---------------------------------------------------------------------------

// -- Fetch strategies --------------------------------------------------------

/** Run a command in a fresh container and read the version from its output. */
export type DockerFetchVersion = {
  type: 'docker';
  /** Image template, rendered with the placeholder as `version`. */
  image: string;
  /** Command argv templates; the first element replaces the entrypoint. */
  command: string[];
}

export type RefMode = 'tags' | 'branches'

/** Pick the newest tag or branch of a source repository. */
export type GithubFetchVersion = {
  type: 'github';
  org: string;
  /** Project template, rendered with the placeholder as `version`. */
  project: string;
  versionFrom: RefMode;
}

export type FetchStrategy = DockerFetchVersion | GithubFetchVersion

// -- Install steps -----------------------------------------------------------

/**
 * `install` steps run in the build stage itself; `build` steps run in an
 * ephemeral stage whose `copy` entries are copied into the build stage.
 */
export type StepStage = 'install' | 'build'

type StepCommon = {
  stage: StepStage;
  /** Source path (in the step's stage) → destination path (in the target). */
  copy: Record<string, string>;
}

/** Script lines keyed by package manager; only the base's one is emitted. */
export type PackageManagerStep = StepCommon & {
  kind: 'package-manager';
  /** Method as written in the config (e.g. "rpm"). */
  method: string;
  scripts: Record<string, string[]>;
}

/** Literal Dockerfile instructions plus the context files they need. */
export type DirectStep = StepCommon & {
  kind: 'direct';
  commands: string[];
  /** Paths relative to the build context. Checked when the script is generated. */
  dependencies: string[];
}

export type InstallStep = PackageManagerStep | DirectStep

// -- Definitions -------------------------------------------------------------

export type BaseDefinition = {
  name: string;
  versions: string[];
  image: string;
  packageManager: string;
  versionTag: string;
  fetchVersion?: FetchStrategy;
}

export type FeatureDefinition = {
  name: string;
  versions: string[];
  /** Rendered tags that are non-empty are joined with "-". */
  versionTag: string[];
  fetchVersion?: FetchStrategy;
  steps: InstallStep[];
}

/** A base or feature taken by a matrix build, optionally narrowed to some placeholders. */
export type BuildSelector = {
  name: string;
  versions?: string[];
}

export type PinnedSelection = {
  name: string;
  version: string;
}

export type MatrixBuildDefinition = {
  kind: 'matrix';
  bases: BuildSelector[];
  /** One member of every group is selected per build. */
  features: BuildSelector[][];
  imageName: string;
  imageTag: string;
}

export type PinnedBuildDefinition = {
  kind: 'pinned';
  base: PinnedSelection;
  features: PinnedSelection[];
  imageName: string;
  imageTag: string;
}

export type BuildDefinition = MatrixBuildDefinition | PinnedBuildDefinition

export type Config = {
  bases: BaseDefinition[];
  features: FeatureDefinition[];
  builds: BuildDefinition[];
}

// -- Locked types ------------------------------------------------------------

export type ImageIdentifier = {
  type: 'Digest';
  digest: string;
}

export type LockedBase = {
  name: string;
  /** Placeholder from the config this version was resolved from. */
  placeholder: string;
  version: string;
  versions: string[];
  packageManager: string;
  tag: string;
  image: string;
  identifier?: ImageIdentifier;
}

export type LockedFeature = {
  name: string;
  placeholder: string;
  version: string;
  versions: string[];
  tag: string;
  steps: InstallStep[];
}

/** Points at a locked base or feature by name and resolved version. */
export type LockRef = {
  name: string;
  version: string;
}

export type LockedBuild = {
  target: string;
  imageName: string;
  imageTag: string;
  base: LockRef;
  /** In feature declaration order. */
  features: LockRef[];
}

export type Lock = {
  bases: LockedBase[];
  features: LockedFeature[];
  builds: LockedBuild[];
}

/** Type guard: returns true for builds with an explicit base and feature versions. */
export function isPinnedBuild(build: BuildDefinition): build is PinnedBuildDefinition {
  return build.kind === 'pinned'
}
