export * from './agent-run'
