export interface ServerConfig {
  ip: string;
  port: number;
  apiKey: string;
}

export interface PathConfig {
  output: string;
}

export interface AppConfig {
  server: ServerConfig;
  paths: PathConfig;
  setupComplete: boolean;
}
