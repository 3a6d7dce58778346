export * from './executeOperation'
