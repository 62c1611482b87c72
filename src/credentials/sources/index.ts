export { TokenCredentialSource, type CredentialSourceOptions } from "./base.js";
export {
  FileCredentialSource,
  DEFAULT_AUTH_FILE_PATH,
  readAuthFile,
} from "./file-source.js";
export { CliCredentialSource } from "./cli-source.js";
export { EnvironmentCredentialSource } from "./environment-source.js";
