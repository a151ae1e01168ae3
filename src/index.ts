export { LogShipper } from "./application/services/LogShipper";
export type { FlushOptions, LogShipperDependencies, ShipperLifecycle, ShipperStats } from "./application/services/LogShipper";
export { ShipperBuilder } from "./application/ShipperBuilder";
export { DEFAULT_RETRY_OPTIONS, DEFAULTS, resolveShipperOptions } from "./application/ShipperOptions";
export type {
  CapacityOptions,
  CompressionMode,
  ErrorContext,
  ErrorHook,
  ExhaustedPolicy,
  OverflowPolicy,
  RetryOptions,
  ShipperOptions,
  StructuredLabelOptions,
  TlsOptions,
} from "./application/ShipperOptions";
export type { DeliveryOutcome, DeliveryResult } from "./application/services/LogShippingService";
export { PayloadEncoder } from "./application/services/PayloadEncoder";
export type { PushBody, PushPayload, PushStream } from "./application/services/PayloadEncoder";
export type { Logger, LogMeta } from "./application/interfaces/Logger";

export { LogRecord, nowInNanos } from "./domain/entities/LogRecord";
export type { FieldValue, LogField, LogRecordProps } from "./domain/entities/LogRecord";
export { LabelSet } from "./domain/value-objects/LabelSet";
export { LOG_LEVELS, LogLevelFilter } from "./domain/value-objects/LogLevel";
export type { LogLevel } from "./domain/value-objects/LogLevel";
export {
  CapacityError,
  ConfigError,
  FlushTimeoutError,
  FormatError,
  ShipperError,
  TransportError,
} from "./domain/errors/ShipperErrors";
export type { Formatter } from "./domain/services/Formatter";
export type { PushClient, PushRequest, PushResponse } from "./domain/services/PushClient";

export { DEFAULT_LOGFMT_FIELDS, LogfmtFields, LogfmtFormatter } from "./infrastructure/formatting/LogfmtFormatter";
export type { LogfmtFormatterOptions } from "./infrastructure/formatting/LogfmtFormatter";
export { JsonFormatter } from "./infrastructure/formatting/JsonFormatter";
export { NodeHttpPushClient } from "./infrastructure/http/NodeHttpPushClient";
export { WinstonLogger } from "./infrastructure/logging/WinstonLogger";
export { RemoteLogger } from "./infrastructure/logging/RemoteLogger";
export { Config } from "./infrastructure/config/Config";
