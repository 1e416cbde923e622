/** Configuration types — layered config system (base.yaml ← <profile>.yaml ← env). */
export type BuildProfile = "debug" | "release";

export type TargetKind = "bare" | "container";

export type BuildConfig = {
  crate_dir: string;
  package: string;
  target: string;
  profile: BuildProfile;
  linker?: string;
  rustflags?: string;
  timeout_ms?: number;
};

export type SessionConfig = {
  /** Local path of the tmux configuration shipped with every deployment. */
  config_file: string;
  remote_dir: string;
  binary_name: string;
  config_name: string;
  install_multiplexer?: boolean;
  /** Wait this long after launch before checking the binary is still up. */
  settle_ms?: number;
};

export type TargetConfig = {
  kind: TargetKind;
  host: string;
  port: number;
  user: string;
  session_name: string;
  /** Container only: sshd binary started inside the local container. */
  sshd_path?: string;
  identity_file?: string;
};

export type TransportConfig = {
  timeout_ms: number;
  strict_host_key_checking?: "yes" | "no" | "accept-new";
};

export type LeaseConfig = {
  enabled: boolean;
  path: string;
};

export type RetrieveConfig = {
  local_dir: string;
  dumps: string;
  images: string;
  snapshot: string;
};

export type CiConfig = {
  workflows: string;
  artifacts_dir: string;
  releases_dir: string;
  pages_dir: string;
  docs_root: string;
};

export type MelvinctlConfig = {
  schema_version: string;
  runs_dir: string;
  default_target: string;
  build: BuildConfig;
  session: SessionConfig;
  targets: Record<string, TargetConfig>;
  transport: TransportConfig;
  lease?: LeaseConfig;
  environment?: Record<string, string>;
  retrieve: RetrieveConfig;
  ci?: CiConfig;
};
