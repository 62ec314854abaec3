/**
 * Device profiles: plain data records matched by manufacturer/model prefix.
 *
 * Profiles are tried in file-name order and the first match wins, so a
 * generic `Sony` profile declared before `Sony/BRAVIA` shadows it. Devices
 * matching nothing get the default profile.
 */

import fs from "fs";
import path from "path";

import { z } from "zod";

import { paths } from "./config.js";
import { describeError } from "./errors.js";
import { CommandMapping, DeviceProfile, FEATURES, Feature, profileFileSchema } from "./types.js";

const FEATURE_NAMES = new Set<string>(FEATURES);

export const DEFAULT_PROFILE: DeviceProfile = {
  name: "default",
  manufacturer: "default",
  model: "",
  features: [
    "on_off",
    "toggle",
    "volume",
    "volume_up_down",
    "mute_toggle",
    "play_pause",
    "next",
    "previous",
    "home",
    "menu",
    "channel_switcher",
    "dpad",
    "select_source",
    "media_title",
    "color_buttons",
    "fast_forward",
    "rewind",
    "numpad",
    "guide",
    "info",
    "eject",
    "open_close",
    "audio_track",
    "subtitle",
    "record"
  ],
  simpleCommands: [],
  commandMap: {}
};

const mediaPlayerCommandsSchema = z.record(z.string().min(1));

// Hub media-player command ids (lower case) to Android TV key names.
const MEDIA_PLAYER_COMMANDS: ReadonlyMap<string, string> = new Map(
  Object.entries(
    mediaPlayerCommandsSchema.parse(
      JSON.parse(fs.readFileSync(paths.resolveDataPath("mediaPlayerCommands.json"), "utf-8"))
    )
  )
);

function isFeature(value: string): value is Feature {
  return FEATURE_NAMES.has(value);
}

function swapCase(value: string): string {
  return Array.from(value, (ch) => {
    const upper = ch.toUpperCase();
    return ch === upper ? ch.toLowerCase() : upper;
  }).join("");
}

/** Sort order for profile files: code-unit order of the case-swapped name. */
export function compareProfileFileNames(a: string, b: string): number {
  const left = swapCase(a);
  const right = swapCase(b);
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

export function parseProfile(name: string, data: unknown): DeviceProfile {
  const parsed = profileFileSchema.parse(data);
  return {
    name,
    manufacturer: parsed.manufacturer,
    model: parsed.model,
    features: parsed.features.map((feature) => feature.toLowerCase()).filter(isFeature),
    simpleCommands: parsed.simple_commands,
    commandMap: parsed.command_map
  };
}

export class ProfileResolver {
  constructor(
    private readonly profiles: DeviceProfile[] = [],
    readonly defaultProfile: DeviceProfile = DEFAULT_PROFILE
  ) {}

  /**
   * Load every `*.json` profile in `dir`. Unreadable or invalid files are
   * logged and skipped; a profile whose manufacturer is `default` replaces the
   * built-in default profile.
   */
  static async load(dir: string): Promise<ProfileResolver> {
    let files: string[];
    try {
      files = (await fs.promises.readdir(dir))
        .filter((file) => file.toLowerCase().endsWith(".json"))
        .sort(compareProfileFileNames);
    } catch (error) {
      console.warn(`[Profiles] Cannot read profile directory ${dir}: ${describeError(error)}`);
      return new ProfileResolver();
    }

    const profiles: DeviceProfile[] = [];
    let defaultProfile = DEFAULT_PROFILE;
    for (const file of files) {
      try {
        const raw = await fs.promises.readFile(path.join(dir, file), "utf-8");
        const profile = parseProfile(path.basename(file, path.extname(file)), JSON.parse(raw));
        if (profile.manufacturer.toLowerCase() === "default") {
          defaultProfile = { ...profile, name: "default" };
        } else {
          profiles.push(profile);
        }
      } catch (error) {
        console.error(`[Profiles] Error loading device profile file ${file}: ${describeError(error)}`);
      }
    }
    console.log(`[Profiles] Loaded ${profiles.length} device profile(s) from ${dir}`);
    return new ProfileResolver(profiles, defaultProfile);
  }

  all(): DeviceProfile[] {
    return [...this.profiles, this.defaultProfile];
  }

  byName(name: string): DeviceProfile | undefined {
    const wanted = name.toLowerCase();
    if (wanted === this.defaultProfile.name) {
      return this.defaultProfile;
    }
    return this.profiles.find((profile) => profile.name.toLowerCase() === wanted);
  }

  resolve(manufacturer: string, model: string): DeviceProfile {
    const deviceManufacturer = manufacturer.toUpperCase();
    const deviceModel = model.toUpperCase();
    for (const profile of this.profiles) {
      if (!deviceManufacturer.startsWith(profile.manufacturer.toUpperCase())) {
        continue;
      }
      if (profile.model && !deviceModel.startsWith(profile.model.toUpperCase())) {
        continue;
      }
      return profile;
    }
    console.log(`[Profiles] No matching device profile for ${manufacturer} ${model}: using default profile`);
    return this.defaultProfile;
  }

  /**
   * Look up a hub command: the profile's own map first, then the standard
   * media-player commands, then literal `KEYCODE_*` names and numeric codes.
   */
  mapCommand(profile: DeviceProfile, command: string): CommandMapping {
    if (Object.hasOwn(profile.commandMap, command)) {
      const mapped = profile.commandMap[command];
      return { kind: "key", keycode: mapped.keycode, action: mapped.action };
    }
    const standard = MEDIA_PLAYER_COMMANDS.get(command.toLowerCase());
    if (standard) {
      return { kind: "key", keycode: standard, action: "short" };
    }
    if (command.startsWith("KEYCODE_")) {
      return { kind: "key", keycode: command, action: "short" };
    }
    if (/^\d+$/.test(command)) {
      return { kind: "key", keycode: Number(command), action: "short" };
    }
    return { kind: "not_supported", command };
  }
}
