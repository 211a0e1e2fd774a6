export * from './modules/accidents/index.js';
export { buildApp, type App, type BuildAppDeps, type StatePlot } from './app/build-app.js';
export { createConfig, parseEnv, type AppConfig, type Env } from './infra/config/env.js';
export {
  createLogger,
  createChildLogger,
  createStreamLogger,
  type Logger,
  type LoggerConfig,
  type LogLevel,
} from './infra/logger/index.js';
