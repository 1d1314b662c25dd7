export const APP_CONFIG = Symbol("APP_CONFIG");
export const CLOCK = Symbol("CLOCK");
export const FRAME_SOURCE = Symbol("FRAME_SOURCE");
export const DETECTION_BACKEND = Symbol("DETECTION_BACKEND");
export const PERSON_DETECTOR = Symbol("PERSON_DETECTOR");
export const COOLDOWN_GATE = Symbol("COOLDOWN_GATE");
export const FRAME_COMPRESSOR = Symbol("FRAME_COMPRESSOR");
export const ANALYZER_CLIENT = Symbol("ANALYZER_CLIENT");
export const ALERT_STORE = Symbol("ALERT_STORE");
export const UPLOAD_WORKER = Symbol("UPLOAD_WORKER");
export const MONITOR_STATS = Symbol("MONITOR_STATS");
export const SNAPSHOT_SINK = Symbol("SNAPSHOT_SINK");
export const RENDER_SINKS = Symbol("RENDER_SINKS");
export const ALERT_NOTIFIER = Symbol("ALERT_NOTIFIER");
