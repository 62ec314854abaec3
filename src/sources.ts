import fs from "fs";

import { z } from "zod";

import { paths } from "./config.js";

const appCatalogSchema = z.object({
  launchLinks: z.record(z.string().min(1)),
  idMappings: z.record(z.string()),
  nameMatching: z.record(z.string()),
  homescreenApps: z.array(z.string()),
  standbyApps: z.array(z.string())
});

export type AppCatalog = z.infer<typeof appCatalogSchema>;

export const INPUT_KEYCODES: Readonly<Record<string, string>> = {
  "HDMI 1": "KEYCODE_TV_INPUT_HDMI_1",
  "HDMI 2": "KEYCODE_TV_INPUT_HDMI_2",
  "HDMI 3": "KEYCODE_TV_INPUT_HDMI_3",
  "HDMI 4": "KEYCODE_TV_INPUT_HDMI_4",
  "Toggle Antenna / Cable": "KEYCODE_TV_ANTENNA_CABLE",
  "Toggle Network": "KEYCODE_TV_NETWORK",
  Satellite: "KEYCODE_TV_SATELLITE",
  "Analog TV": "KEYCODE_TV_TERRESTRIAL_ANALOG",
  "Digital TV": "KEYCODE_TV_TERRESTRIAL_DIGITAL",
  "Composite 1": "KEYCODE_TV_INPUT_COMPOSITE_1",
  "Composite 2": "KEYCODE_TV_INPUT_COMPOSITE_2",
  "Component 1": "KEYCODE_TV_INPUT_COMPONENT_1",
  "Component 2": "KEYCODE_TV_INPUT_COMPONENT_2",
  "VGA 1": "KEYCODE_TV_INPUT_VGA_1"
};

export function loadAppCatalog(file = paths.resolveDataPath("apps.json")): AppCatalog {
  return appCatalogSchema.parse(JSON.parse(fs.readFileSync(file, "utf-8")));
}

export const appCatalog = loadAppCatalog();

export type SourceTarget = { kind: "app"; link: string } | { kind: "input"; keycode: string };

/** A named app, then a named input; anything else is launched as an app link. */
export function resolveSource(source: string, catalog: AppCatalog = appCatalog): SourceTarget {
  if (Object.hasOwn(catalog.launchLinks, source)) {
    return { kind: "app", link: catalog.launchLinks[source] };
  }
  if (Object.hasOwn(INPUT_KEYCODES, source)) {
    return { kind: "input", keycode: INPUT_KEYCODES[source] };
  }
  return { kind: "app", link: source };
}

export function sourceList(catalog: AppCatalog = appCatalog): string[] {
  return [...Object.keys(catalog.launchLinks), ...Object.keys(INPUT_KEYCODES)];
}

export function friendlyAppName(appId: string, catalog: AppCatalog = appCatalog): string {
  if (Object.hasOwn(catalog.idMappings, appId)) {
    return catalog.idMappings[appId];
  }
  const lowered = appId.toLowerCase();
  for (const [needle, name] of Object.entries(catalog.nameMatching)) {
    if (lowered.includes(needle)) {
      return name;
    }
  }
  return appId;
}

export function isHomescreenApp(appId: string, catalog: AppCatalog = appCatalog): boolean {
  return catalog.homescreenApps.includes(appId);
}

export function isStandbyApp(appId: string, catalog: AppCatalog = appCatalog): boolean {
  return catalog.standbyApps.includes(appId);
}
