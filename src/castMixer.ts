import { describeError } from "./errors.js";
import { CastChannel, CastClient, CastEvent, CastPlayerState } from "./transport.js";
import { AttributeUpdate, MediaState } from "./types.js";

export interface CastMixerOptions {
  /** Minimum time, in seconds, between two published positions of the same item. */
  positionThresholdSec: number;
  now?: () => number;
}

export type MediaDeltaListener = (delta: AttributeUpdate) => void;

interface MediaCache {
  title: string;
  artist: string;
  album: string;
  imageUrl: string;
  duration?: number;
  position?: number;
  publishedPosition?: number;
  positionUpdatedAt?: number;
  playerState?: CastPlayerState;
}

const PLAYER_STATES: Record<CastPlayerState, MediaState> = {
  playing: "playing",
  paused: "paused",
  buffering: "buffering",
  idle: "on"
};

function emptyCache(): MediaCache {
  return { title: "", artist: "", album: "", imageUrl: "" };
}

function nextText(current: string, incoming: string | null | undefined): string | undefined {
  if (incoming === undefined) {
    return undefined;
  }
  const value = incoming ?? "";
  return value === current ? undefined : value;
}

export function isValidImageUrl(value: string): boolean {
  if (value.startsWith("data:")) {
    return /^data:image\/[a-z0-9.+-]+(;[^,]*)?,.+/i.test(value);
  }
  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return false;
  }
  return (url.protocol === "http:" || url.protocol === "https:") && url.hostname.length > 0;
}

/** Shortens data URIs so log lines stay readable. */
export function filterDataImages(update: AttributeUpdate): AttributeUpdate {
  if (update.media_image_url?.startsWith("data:")) {
    return { ...update, media_image_url: "data:***" };
  }
  return update;
}

/**
 * Media status from the cast channel of one device. Events are merged into a
 * cache and only deltas reach the owning session; each attachment gets a new
 * generation so events from a previous connection are dropped.
 */
export class CastStatusMixer {
  private generation = 0;
  private controller?: AbortController;
  private channel?: CastChannel;
  private cache: MediaCache = emptyCache();
  private readonly now: () => number;

  constructor(
    private readonly deviceId: string,
    private readonly client: CastClient,
    private readonly onDelta: MediaDeltaListener,
    private readonly options: CastMixerOptions
  ) {
    this.now = options.now ?? Date.now;
  }

  get activeChannel(): CastChannel | undefined {
    return this.channel;
  }

  attach(address: string): void {
    this.detach();
    const generation = this.generation;
    const controller = new AbortController();
    this.controller = controller;
    this.run(address, generation, controller.signal).catch((error) =>
      console.error(`[CastMixer ${this.deviceId}] read loop failed: ${describeError(error)}`)
    );
  }

  detach(): void {
    this.generation += 1;
    this.controller?.abort();
    this.controller = undefined;
    const channel = this.channel;
    this.channel = undefined;
    channel?.close();
    this.cache = emptyCache();
  }

  onMediaUpdate(event: CastEvent): void {
    const delta: AttributeUpdate = {};
    let forcePosition = false;

    if (event.playerState !== undefined && event.playerState !== this.cache.playerState) {
      this.cache.playerState = event.playerState;
      delta.state = PLAYER_STATES[event.playerState];
      forcePosition = true;
    }

    const title = nextText(this.cache.title, event.title);
    if (title !== undefined) {
      this.cache.title = title;
      delta.media_title = title;
    }
    const artist = nextText(this.cache.artist, event.artist);
    if (artist !== undefined) {
      this.cache.artist = artist;
      delta.media_artist = artist;
    }
    const album = nextText(this.cache.album, event.album);
    if (album !== undefined) {
      this.cache.album = album;
      delta.media_album = album;
    }

    this.mergeImage(event.imageUrl, title !== undefined, delta);

    if (event.duration !== undefined) {
      const duration = Math.floor(event.duration ?? 0);
      if (duration !== this.cache.duration) {
        this.cache.duration = duration;
        delta.media_duration = duration;
        forcePosition = true;
      }
    }
    if (event.position !== undefined && event.position !== null) {
      this.cache.position = Math.floor(event.position);
    }
    this.mergePosition(forcePosition, delta);

    if (Object.keys(delta).length > 0) {
      this.onDelta(delta);
    }
  }

  private mergeImage(imageUrl: string | null | undefined, itemChanged: boolean, delta: AttributeUpdate): void {
    if (imageUrl === undefined) {
      return;
    }
    if (imageUrl === null || imageUrl === "") {
      // a missing image only clears the artwork of a new media item
      if (itemChanged && this.cache.imageUrl) {
        this.cache.imageUrl = "";
        delta.media_image_url = "";
      }
      return;
    }
    if (!isValidImageUrl(imageUrl)) {
      console.warn(`[CastMixer ${this.deviceId}] Ignoring invalid media image url: ${imageUrl.slice(0, 64)}`);
      return;
    }
    if (imageUrl !== this.cache.imageUrl) {
      this.cache.imageUrl = imageUrl;
      delta.media_image_url = imageUrl;
    }
  }

  private mergePosition(force: boolean, delta: AttributeUpdate): void {
    const position = this.cache.position;
    if (position === undefined) {
      return;
    }
    const published = this.cache.publishedPosition;
    const now = this.now();
    const lastPublishedAt = this.cache.positionUpdatedAt ?? Number.NEGATIVE_INFINITY;
    const publish =
      published === undefined ||
      (position !== published && (force || now - lastPublishedAt >= this.options.positionThresholdSec * 1000));
    if (!publish) {
      return;
    }
    this.cache.publishedPosition = position;
    this.cache.positionUpdatedAt = now;
    delta.media_position = position;
    delta.media_position_updated_at = new Date(now).toISOString();
  }

  private async run(address: string, generation: number, signal: AbortSignal): Promise<void> {
    let channel: CastChannel;
    try {
      channel = await this.client.subscribe(address, signal);
    } catch (error) {
      if (!signal.aborted) {
        console.warn(`[CastMixer ${this.deviceId}] Cast channel unavailable on ${address}: ${describeError(error)}`);
      }
      return;
    }
    if (signal.aborted || generation !== this.generation) {
      channel.close();
      return;
    }
    this.channel = channel;
    console.log(`[CastMixer ${this.deviceId}] attached to ${address}`);

    try {
      for await (const event of channel.events) {
        if (signal.aborted || generation !== this.generation) {
          break;
        }
        this.onMediaUpdate(event);
      }
    } catch (error) {
      if (!signal.aborted) {
        console.warn(`[CastMixer ${this.deviceId}] cast event stream failed: ${describeError(error)}`);
      }
    } finally {
      if (this.channel === channel) {
        this.channel = undefined;
      }
      channel.close();
    }
  }
}
