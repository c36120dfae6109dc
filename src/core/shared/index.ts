// 공통 모듈 exports

export * from './errors';
export * from './coordinate';
export * from './repositories';
export * from './content-fetcher';
export * from './digest';
export * from './module-metadata';
export * from './pom-handler';
export * from './manifest-store';
