export { DependencyInstaller } from './DependencyInstaller.ts';
export { EnvironmentConfigurator } from './EnvironmentConfigurator.ts';
export { RepositorySynchronizer } from './RepositorySynchronizer.ts';
export { SdkProvisioner } from './SdkProvisioner.ts';
export { SWIFT_QUESTION, ToolchainProvisioner } from './ToolchainProvisioner.ts';
export { ensureResource } from './resource.ts';
export type { ResourceOutcome, ResourceSpec } from './resource.ts';
