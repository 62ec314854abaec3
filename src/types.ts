import { z } from "zod";

export type SessionState = "disconnected" | "connecting" | "pairing" | "connected" | "reconnecting" | "error";

export type PowerState = "on" | "off" | "unknown";

export type KeyAction = "short" | "long" | "double_click" | "begin" | "end";

export type KeyDirection = "short" | "start_long" | "end_long";

export type Keycode = string | number;

export interface KeyCommand {
  keycode: Keycode;
  action: KeyAction;
}

export const FEATURES = [
  "on_off",
  "toggle",
  "volume",
  "volume_up_down",
  "mute_toggle",
  "play_pause",
  "stop",
  "next",
  "previous",
  "fast_forward",
  "rewind",
  "home",
  "menu",
  "context_menu",
  "channel_switcher",
  "dpad",
  "select_source",
  "media_title",
  "media_artist",
  "media_album",
  "media_image_url",
  "media_position",
  "media_duration",
  "seek",
  "color_buttons",
  "numpad",
  "guide",
  "info",
  "eject",
  "open_close",
  "audio_track",
  "subtitle",
  "record",
  "settings"
] as const;

export type Feature = (typeof FEATURES)[number];

export interface DeviceProfile {
  /** Source file name, or "default" for the built-in fallback. */
  name: string;
  manufacturer: string;
  model: string;
  features: Feature[];
  simpleCommands: string[];
  commandMap: Record<string, KeyCommand>;
}

export type CommandMapping =
  | { kind: "key"; keycode: Keycode; action: KeyAction }
  | { kind: "not_supported"; command: string };

export interface DeviceConfig {
  id: string;
  name: string;
  address: string;
  manufacturer: string;
  model: string;
  profileOverride?: string;
  castEnabled: boolean;
  castVolume: boolean;
  castVolumeStep: number;
  externalMetadata: boolean;
  authError: boolean;
}

export type MediaState = "on" | "off" | "playing" | "paused" | "buffering" | "standby" | "unavailable";

export interface DeviceAttributes {
  state: MediaState;
  connection: SessionState;
  media_title: string;
  media_artist: string;
  media_album: string;
  media_image_url: string;
  media_position: number;
  media_duration: number;
  media_position_updated_at: string;
  volume: number;
  muted: boolean;
  source: string;
  source_list: string[];
  features: Feature[];
  pairing_failures: number;
}

export type AttributeUpdate = Partial<DeviceAttributes>;

export interface DeviceSnapshot {
  deviceId: string;
  name: string;
  address: string;
  state: SessionState;
  power: PowerState;
  profile?: string;
  queueDepth: number;
  attributes: AttributeUpdate;
}

export type CommandParams = Record<string, unknown>;

export type ErrorKind =
  | "not_supported"
  | "device_unreachable"
  | "pairing_failed"
  | "pairing_required"
  | "certificate_invalid"
  | "timeout"
  | "unknown_device"
  | "queue_overflow"
  | "invalid_params";

export type CommandResult =
  | { status: "ok" }
  | { status: "queued" }
  | { status: "error"; kind: ErrorKind; message: string };

export type PairingResult = { status: "trusted" } | { status: "error"; kind: ErrorKind; message: string };

export interface CommandLogEntry {
  id: string;
  deviceId: string;
  command: string;
  params?: CommandParams;
  result: CommandResult;
  clientId?: string;
  timestamp: string;
}

const keyActionSchema = z.enum(["short", "long", "double_click", "begin", "end"]);

export const profileFileSchema = z.object({
  manufacturer: z.string().min(1),
  model: z.string().default(""),
  features: z.array(z.string()).default([]),
  simple_commands: z.array(z.string()).default([]),
  command_map: z
    .record(
      z.object({
        keycode: z.union([z.string().min(1), z.number().int().nonnegative()]),
        action: z
          .string()
          .transform((value) => value.toLowerCase())
          .pipe(keyActionSchema)
          .default("short")
      })
    )
    .default({})
});

export type ProfileFile = z.infer<typeof profileFileSchema>;

export const deviceConfigSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  address: z.string().min(1),
  manufacturer: z.string().default(""),
  model: z.string().default(""),
  profile_override: z.string().optional(),
  cast_enabled: z.boolean().default(false),
  cast_volume: z.boolean().default(false),
  cast_volume_step: z.number().int().min(1).max(100).default(10),
  external_metadata: z.boolean().default(false),
  auth_error: z.boolean().default(false)
});

export type DeviceConfigPayload = z.infer<typeof deviceConfigSchema>;

export const commandSchema = z.object({
  command: z.string().min(1),
  params: z.record(z.unknown()).optional()
});

export const pinSchema = z.object({
  pin: z.string().regex(/^[0-9a-fA-F]{4,8}$/)
});

export const socketRequestSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("command"),
    deviceId: z.string().min(1),
    command: z.string().min(1),
    params: z.record(z.unknown()).optional(),
    requestId: z.string().optional()
  }),
  z.object({
    type: z.literal("pin"),
    deviceId: z.string().min(1),
    pin: z.string().min(1),
    requestId: z.string().optional()
  })
]);

export type SocketRequest = z.infer<typeof socketRequestSchema>;

export type WebsocketPush =
  | { type: "devices"; devices: DeviceSnapshot[] }
  | { type: "attributes"; deviceId: string; attributes: AttributeUpdate }
  | { type: "commandlog"; entry: CommandLogEntry }
  | { type: "result"; requestId?: string; result: CommandResult | PairingResult }
  | { type: "error"; requestId?: string; error: string };
