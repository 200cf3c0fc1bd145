export interface ResourceState {
  environment: boolean;
  repository: boolean;
  toolchain: boolean;
  sdks: boolean;
}

export interface StatusReport {
  root: string;
  state: ResourceState;
}
