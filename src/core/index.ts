// Core module exports

// Generator
export { generateSources, writeAtomically } from './generator';
export type { GenerateOptions, GenerateResult } from './generator';

// Dependency Walker
export { DependencyWalker, DEFAULT_CONCURRENCY } from './dependencyWalker';
export type { DependencyWalkerOptions } from './dependencyWalker';

// Resolver
export { ArtifactResolver, locateRemote } from './resolver/artifactResolver';
export type { ArtifactResolverOptions, CachedResolveOptions, DependencyResolution } from './resolver/artifactResolver';

// Dependency graph
export { JsonGraphProvider, filterConfigurations, fileArtifact } from './graph/graphProvider';
export type { DependencyGraphProvider, ConfigurationFilter } from './graph/graphProvider';

// Config
export { ConfigManager, getConfigManager, parseConfigObject } from './config';
export type { GeneratorConfig, ConfigOverrides } from './config';

// Shared utilities
export * from './shared';

// Types
export * from '../types';
