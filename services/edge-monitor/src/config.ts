import { z } from "zod";

export const analyzerProviders = ["remote", "gemini"] as const;
export type AnalyzerProvider = (typeof analyzerProviders)[number];

export const monitorConfigSchema = z
  .object({
    cooldownSeconds: z.number().nonnegative(),
    thresholds: z.object({
      confidence: z.number().min(0).max(1),
    }),
    video: z.object({
      source: z.string().min(1),
      width: z.number().int().positive(),
      height: z.number().int().positive(),
      fps: z.number().positive(),
      targetFps: z.number().nonnegative(),
      loop: z.boolean(),
      ffmpegPath: z.string().min(1),
      startTimeoutMs: z.number().int().positive(),
    }),
    compression: z.object({
      size: z.number().int().positive(),
      quality: z.number().int().min(1).max(100),
    }),
    detector: z.object({
      url: z.string().url(),
      timeoutMs: z.number().int().positive(),
    }),
    analyzer: z.object({
      provider: z.enum(analyzerProviders),
      url: z.string().url().optional(),
      timeoutMs: z.number().int().positive(),
      instruction: z.string().min(1).optional(),
      gemini: z.object({
        apiKey: z.string().min(1).optional(),
        model: z.string().min(1),
      }),
    }),
    classifier: z.object({
      benignTypes: z.array(z.string()),
      defaultMessage: z.string().min(1),
    }),
    overlay: z.object({
      alertDisplaySeconds: z.number().nonnegative(),
    }),
    notifier: z.object({
      cooldownSeconds: z.number().nonnegative(),
      webhookUrl: z.string().url().optional(),
      location: z.string().min(1),
    }),
    monitor: z.object({
      autoStart: z.boolean(),
      drainGraceMs: z.number().int().nonnegative(),
    }),
    server: z.object({
      port: z.number().int().nonnegative(),
    }),
  })
  .superRefine((config, ctx) => {
    if (config.analyzer.provider === "remote" && !config.analyzer.url) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["analyzer", "url"],
        message: "analyzer.url is required for the remote provider",
      });
    }
    if (config.analyzer.provider === "gemini" && !config.analyzer.gemini.apiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["analyzer", "gemini", "apiKey"],
        message: "analyzer.gemini.apiKey is required for the gemini provider",
      });
    }
  });

export type MonitorConfig = z.infer<typeof monitorConfigSchema>;

type Section<K extends keyof MonitorConfig> = Partial<MonitorConfig[K]>;

export interface ConfigOverrides {
  cooldownSeconds?: number;
  thresholds?: Section<"thresholds">;
  video?: Section<"video">;
  compression?: Section<"compression">;
  detector?: Section<"detector">;
  analyzer?: Partial<Omit<MonitorConfig["analyzer"], "gemini">> & {
    gemini?: Partial<MonitorConfig["analyzer"]["gemini"]>;
  };
  classifier?: Section<"classifier">;
  overlay?: Section<"overlay">;
  notifier?: Section<"notifier">;
  monitor?: Section<"monitor">;
  server?: Section<"server">;
}

export const DEFAULT_BENIGN_TYPES = ["安全", "safe", "none", "normal"];

const defaults: MonitorConfig = {
  cooldownSeconds: 5,
  thresholds: { confidence: 0.25 },
  video: {
    source: "0",
    width: 640,
    height: 480,
    fps: 30,
    targetFps: 0,
    loop: true,
    ffmpegPath: "ffmpeg",
    startTimeoutMs: 10000,
  },
  compression: { size: 640, quality: 80 },
  detector: { url: "http://127.0.0.1:8500", timeoutMs: 2000 },
  analyzer: {
    provider: "remote",
    url: "http://localhost:8000/chat",
    timeoutMs: 30000,
    instruction: undefined,
    gemini: { apiKey: undefined, model: "gemini-2.0-flash" },
  },
  classifier: {
    benignTypes: DEFAULT_BENIGN_TYPES,
    defaultMessage: "Normal activity",
  },
  overlay: { alertDisplaySeconds: 5 },
  notifier: { cooldownSeconds: 2, webhookUrl: undefined, location: "camera-1" },
  monitor: { autoStart: true, drainGraceMs: 2000 },
  server: { port: 8080 },
};

export const resolveConfig = (partial: ConfigOverrides = {}): MonitorConfig => {
  const merged: MonitorConfig = {
    cooldownSeconds: partial.cooldownSeconds ?? defaults.cooldownSeconds,
    thresholds: {
      confidence: partial.thresholds?.confidence ?? defaults.thresholds.confidence,
    },
    video: {
      source: partial.video?.source ?? defaults.video.source,
      width: partial.video?.width ?? defaults.video.width,
      height: partial.video?.height ?? defaults.video.height,
      fps: partial.video?.fps ?? defaults.video.fps,
      targetFps: partial.video?.targetFps ?? defaults.video.targetFps,
      loop: partial.video?.loop ?? defaults.video.loop,
      ffmpegPath: partial.video?.ffmpegPath ?? defaults.video.ffmpegPath,
      startTimeoutMs: partial.video?.startTimeoutMs ?? defaults.video.startTimeoutMs,
    },
    compression: {
      size: partial.compression?.size ?? defaults.compression.size,
      quality: partial.compression?.quality ?? defaults.compression.quality,
    },
    detector: {
      url: partial.detector?.url ?? defaults.detector.url,
      timeoutMs: partial.detector?.timeoutMs ?? defaults.detector.timeoutMs,
    },
    analyzer: {
      provider: partial.analyzer?.provider ?? defaults.analyzer.provider,
      url: partial.analyzer?.url ?? defaults.analyzer.url,
      timeoutMs: partial.analyzer?.timeoutMs ?? defaults.analyzer.timeoutMs,
      instruction: partial.analyzer?.instruction ?? defaults.analyzer.instruction,
      gemini: {
        apiKey: partial.analyzer?.gemini?.apiKey ?? defaults.analyzer.gemini.apiKey,
        model: partial.analyzer?.gemini?.model ?? defaults.analyzer.gemini.model,
      },
    },
    classifier: {
      benignTypes: partial.classifier?.benignTypes ?? defaults.classifier.benignTypes,
      defaultMessage: partial.classifier?.defaultMessage ?? defaults.classifier.defaultMessage,
    },
    overlay: {
      alertDisplaySeconds: partial.overlay?.alertDisplaySeconds ?? defaults.overlay.alertDisplaySeconds,
    },
    notifier: {
      cooldownSeconds: partial.notifier?.cooldownSeconds ?? defaults.notifier.cooldownSeconds,
      webhookUrl: partial.notifier?.webhookUrl ?? defaults.notifier.webhookUrl,
      location: partial.notifier?.location ?? defaults.notifier.location,
    },
    monitor: {
      autoStart: partial.monitor?.autoStart ?? defaults.monitor.autoStart,
      drainGraceMs: partial.monitor?.drainGraceMs ?? defaults.monitor.drainGraceMs,
    },
    server: {
      port: partial.server?.port ?? defaults.server.port,
    },
  };

  return monitorConfigSchema.parse(merged);
};

type Env = Record<string, string | undefined>;

const numberFrom = (value: string | undefined): number | undefined =>
  value === undefined || value.trim() === "" ? undefined : Number(value);

const flagFrom = (value: string | undefined): boolean | undefined => {
  if (value === undefined || value.trim() === "") return undefined;
  return ["1", "true", "yes", "on"].includes(value.trim().toLowerCase());
};

const listFrom = (value: string | undefined): string[] | undefined =>
  value === undefined
    ? undefined
    : value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0);

const providerFrom = (value: string | undefined): AnalyzerProvider | undefined => {
  if (value === undefined) return undefined;
  const provider = analyzerProviders.find((candidate) => candidate === value.trim().toLowerCase());
  if (!provider) {
    throw new Error(`Unsupported ANALYZER_PROVIDER: ${value}`);
  }
  return provider;
};

export function loadConfig(env: Env = process.env): MonitorConfig {
  return resolveConfig({
    cooldownSeconds: numberFrom(env.COOLDOWN_SECONDS),
    thresholds: {
      confidence: numberFrom(env.DETECTION_CONFIDENCE),
    },
    video: {
      source: env.VIDEO_SOURCE,
      width: numberFrom(env.VIDEO_WIDTH),
      height: numberFrom(env.VIDEO_HEIGHT),
      fps: numberFrom(env.VIDEO_FPS),
      targetFps: numberFrom(env.VIDEO_TARGET_FPS),
      loop: flagFrom(env.VIDEO_LOOP),
      ffmpegPath: env.FFMPEG_PATH,
      startTimeoutMs: numberFrom(env.VIDEO_START_TIMEOUT_MS),
    },
    compression: {
      size: numberFrom(env.UPLOAD_IMAGE_SIZE),
      quality: numberFrom(env.UPLOAD_JPEG_QUALITY),
    },
    detector: {
      url: env.DETECTOR_URL,
      timeoutMs: numberFrom(env.DETECTOR_TIMEOUT_MS),
    },
    analyzer: {
      provider: providerFrom(env.ANALYZER_PROVIDER),
      url: env.ANALYZER_URL,
      timeoutMs: numberFrom(env.ANALYZER_TIMEOUT_MS),
      instruction: env.ANALYZER_INSTRUCTION,
      gemini: {
        apiKey: env.GEMINI_API_KEY,
        model: env.GEMINI_MODEL,
      },
    },
    classifier: {
      benignTypes: listFrom(env.BENIGN_ALERT_TYPES),
      defaultMessage: env.DEFAULT_ALERT_MESSAGE,
    },
    overlay: {
      alertDisplaySeconds: numberFrom(env.ALERT_DISPLAY_SECONDS),
    },
    notifier: {
      cooldownSeconds: numberFrom(env.ALERT_COOLDOWN_SECONDS),
      webhookUrl: env.ALERT_WEBHOOK_URL,
      location: env.CAMERA_LOCATION,
    },
    monitor: {
      autoStart: flagFrom(env.MONITOR_AUTOSTART),
      drainGraceMs: numberFrom(env.MONITOR_DRAIN_GRACE_MS),
    },
    server: {
      port: numberFrom(env.STATUS_PORT ?? env.PORT),
    },
  });
}
