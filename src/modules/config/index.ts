export { ConfigModule, validate } from "./config.module";
export { Environment, EnvironmentVariables } from "./env.validation";
