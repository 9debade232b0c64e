// src/index.ts
export {
  loadConfig,
  runtimeMode,
  isDevelopment,
  type RuntimeMode,
  type LogLevel,
  type ServiceKitConfig,
} from "./config/config";
export { getLogger, initLogger, setLogLevel } from "./logger/logger";

export {
  AppError,
  type AppErrorKind,
  type ErrorResponseBody,
  type HttpResponseLike,
} from "./errors/AppError";
export { asyncHandler } from "./middleware/asyncHandler";
export {
  errorResponder,
  type ErrorResponderOptions,
} from "./middleware/errorResponder";
export { jsonBody, JSON_BODY_LIMIT } from "./middleware/jsonBody";
export { permissiveCors } from "./middleware/permissiveCors";
export { makeHttpLogger } from "./middleware/httpLogger";

export { headerValue } from "./http/headers";
export {
  createServiceApp,
  type ConfigureRoutes,
  type CreateServiceAppOptions,
} from "./http/createServiceApp";
export {
  startHttpServer,
  DEFAULT_HOST,
  type StartHttpServerOptions,
  type StartedServer,
} from "./http/startHttpServer";
export {
  createHttpServer,
  DEFAULT_WORKER_COUNT,
  type CreateHttpServerOptions,
  type HttpServerHandle,
} from "./http/createHttpServer";

export { AssetBundle, type AssetFile } from "./assets/AssetBundle";
export { mimeForPath } from "./assets/mime";
export {
  mountAssetRoutes,
  serveAsset,
  serveIndex,
  devServerProxy,
  type MountAssetRoutesOptions,
} from "./assets/mountAssetRoutes";

export {
  DatabaseConnectionDataSchema,
  FilemakerCredentialsSchema,
  fetchDatabaseConnectionData,
  fetchRemoteDatabaseConnectionData,
  loadLocalDatabaseConnectionData,
  type DatabaseConnectionData,
  type FilemakerCredentials,
  type FetchConnectionDataOptions,
} from "./db/DatabaseConnectionData";
export {
  setDatabaseName,
  getDatabaseName,
  isDatabaseNameSet,
} from "./db/databaseName";
export { createPool, buildConnectionString } from "./db/createPool";
export { OnceCell } from "./util/OnceCell";
