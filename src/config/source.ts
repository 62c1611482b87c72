export interface ConfigurationSource {
  load(): Promise<unknown>;
}
