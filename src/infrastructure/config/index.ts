export { Config } from './Config';
export type { ConfigOptions, ConfigOverrides, GateConfig, PipelineConfig, LivenessConfig, NotificationConfig } from './Config';
