import { z } from "zod";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

export const ReportsSchema = z.object({
  directory: z.string().min(1).default("reports"),
  prefix: z.string().regex(/^[A-Za-z0-9._-]+$/).default("sysreport"),
  format: z.enum(["text", "json"]).default("text"),
}).strict();

export const SpeedtestSchema = z.object({
  servers_url: z.string().url().default("https://www.speedtest.net/api/js/servers?engine=js&https_functional=true&limit=10"),
  candidate_servers: z.number().int().min(1).max(10).default(5),
  request_timeout_ms: z.number().int().min(1000).max(120000).default(15000),
  download_sizes: z.array(z.number().int().positive()).nonempty().default([350, 500, 750, 1000, 1500]),
  upload_bytes: z.number().int().min(1024).default(2 * 1024 * 1024),
}).strict();

export const NetworkSchema = z.object({
  host: z.string().min(1).default("google.com"),
  timeout_seconds: z.number().int().min(1).max(60).default(3),
  grace_seconds: z.number().int().min(0).max(10).default(1),
  speedtest: SpeedtestSchema.default({}),
}).strict();

export const CollectorSchema = z.object({
  cpu_sample_ms: z.number().int().min(0).max(10000).default(1000),
  disk_mount: z.string().min(1).optional(),
}).strict();

export const ServerSchema = z.object({
  bind: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(1).max(65535).default(5000),
}).strict();

export const LoggingSchema = z.object({
  level: LogLevelSchema.default("warn"),
}).strict();

export const SysTrackConfigSchema = z.object({
  reports: ReportsSchema.default({}),
  network: NetworkSchema.default({}),
  collector: CollectorSchema.default({}),
  server: ServerSchema.default({}),
  logging: LoggingSchema.default({}),
}).strict();

// Export types
export type SysTrackConfig = z.infer<typeof SysTrackConfigSchema>;
export type ReportsConfig = z.infer<typeof ReportsSchema>;
export type NetworkConfig = z.infer<typeof NetworkSchema>;
export type SpeedtestConfig = z.infer<typeof SpeedtestSchema>;
export type CollectorConfig = z.infer<typeof CollectorSchema>;
export type ServerConfig = z.infer<typeof ServerSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;

// Validation helpers
export const validateConfig = (data: unknown): SysTrackConfig => {
  return SysTrackConfigSchema.parse(data);
};

export const validateConfigSafe = (data: unknown) => {
  return SysTrackConfigSchema.safeParse(data);
};
