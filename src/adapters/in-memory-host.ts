/**
 * InMemoryHost: a simulated music session behind the HostApiAdapter seam.
 *
 * Holds tracks (mixer state, clip slots, devices), scenes, locators, master
 * volume, tempo, time signature and transport. Parameters are validated with
 * zod; bad indices and values throw HostError with the same messages a live
 * host reports. Mutations are undoable.
 *
 * Not thread-safe and not reentrant: it assumes the serializer is its only
 * caller, like the real host.
 */

import { z } from "zod";
import { HostError } from "../errors.js";
import type { HostApiAdapter } from "../interfaces/host-api.js";
import { COMMAND_NAMES, type CommandName, type CommandParams, type JsonValue } from "../types/commands.js";

// ---------------------------------------------------------------------------
// Session model
// ---------------------------------------------------------------------------

const LAUNCH_MODES = ["trigger", "gate", "toggle", "repeat"] as const;
type LaunchMode = (typeof LAUNCH_MODES)[number];

interface Note {
  pitch: number;
  start_time: number;
  duration: number;
  velocity: number;
  mute: boolean;
}

interface Clip {
  name: string;
  length: number;
  launchMode: LaunchMode;
  playing: boolean;
  notes: Note[];
}

interface DeviceParameter {
  name: string;
  value: number;
  min: number;
  max: number;
}

interface Device {
  name: string;
  className: string;
  parameters: DeviceParameter[];
}

interface Track {
  name: string;
  kind: "midi" | "audio";
  color: number;
  volume: number;
  pan: number;
  mute: boolean;
  solo: boolean;
  arm: boolean;
  slots: Array<Clip | null>;
  devices: Device[];
}

interface Session {
  tempo: number;
  numerator: number;
  denominator: number;
  metronome: boolean;
  playing: boolean;
  recording: boolean;
  position: number;
  loop: { enabled: boolean; start: number; length: number };
  masterVolume: number;
  tracks: Track[];
  scenes: Array<{ name: string }>;
  locators: Array<{ name: string; time: number }>;
}

/** Unity gain on the mixer's normalized fader. */
const UNITY_VOLUME = 0.85;
const HISTORY_LIMIT = 100;
const MACRO_COUNT = 4;

export interface InMemoryHostOptions {
  /** Scenes (and so clip slots per track) in a fresh session (default: 8). */
  sceneCount?: number;
  tempo?: number;
}

function emptySession(options: InMemoryHostOptions): Session {
  return {
    tempo: options.tempo ?? 120,
    numerator: 4,
    denominator: 4,
    metronome: false,
    playing: false,
    recording: false,
    position: 0,
    loop: { enabled: false, start: 0, length: 16 },
    masterVolume: UNITY_VOLUME,
    tracks: [],
    scenes: Array.from({ length: options.sceneCount ?? 8 }, () => ({ name: "" })),
    locators: [],
  };
}

// ---------------------------------------------------------------------------
// Parameter schemas
// ---------------------------------------------------------------------------

const index = z.number().int();
const unit = z.number().min(0).max(1);
const insertAt = z.number().int().min(-1).default(-1);

const trackArgs = z.object({ track_index: index });
const slotArgs = trackArgs.extend({ clip_index: index });
const deviceArgs = trackArgs.extend({ device_index: index });
const sceneArgs = z.object({ scene_index: index });
const locatorArgs = z.object({ locator_index: index });
const noArgs = z.object({});

const noteSchema = z.object({
  pitch: z.number().int().min(0).max(127).default(60),
  start_time: z.number().min(0).default(0),
  duration: z.number().positive().default(0.25),
  velocity: z.number().int().min(1).max(127).default(100),
  mute: z.boolean().default(false),
});

interface Operation {
  run(params: CommandParams): JsonValue;
  /** Whether a successful call is recorded for undo. */
  undoable: boolean;
}

function op<T>(
  name: CommandName,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  run: (args: T) => JsonValue,
  undoable = true,
): Operation {
  return {
    undoable,
    run(params) {
      const parsed = schema.safeParse(params);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const where = issue?.path.join(".") || "params";
        throw new HostError(
          `Invalid parameters for ${name}: ${where}: ${issue?.message ?? "invalid"}`,
        );
      }
      return run(parsed.data);
    },
  };
}

// ---------------------------------------------------------------------------
// Host
// ---------------------------------------------------------------------------

export class InMemoryHost implements HostApiAdapter {
  private session: Session;
  private readonly undoStack: Session[] = [];
  private readonly redoStack: Session[] = [];
  private readonly operations: Partial<Record<CommandName, Operation>>;

  constructor(options: InMemoryHostOptions = {}) {
    this.session = emptySession(options);
    this.operations = this.buildOperations();
  }

  invoke(name: CommandName, params: CommandParams): JsonValue {
    const operation = this.operations[name];
    if (!operation) throw new HostError(`Command not supported by this host: ${name}`);

    if (!operation.undoable) return operation.run(params);

    const before = structuredClone(this.session);
    const result = operation.run(params);
    this.undoStack.push(before);
    if (this.undoStack.length > HISTORY_LIMIT) this.undoStack.shift();
    this.redoStack.length = 0;
    return result;
  }

  /** Commands this host implements. */
  supportedCommands(): CommandName[] {
    return COMMAND_NAMES.filter((name) => this.operations[name] !== undefined);
  }

  // ── Lookups ──

  private track(i: number): Track {
    const track = this.session.tracks[i];
    if (!track) throw new HostError("Track index out of range");
    return track;
  }

  private slotOf(track: Track, i: number): { clip: Clip | null } {
    if (i < 0 || i >= track.slots.length) throw new HostError("Clip index out of range");
    return { clip: track.slots[i] ?? null };
  }

  private clip(trackIndex: number, clipIndex: number): Clip {
    const { clip } = this.slotOf(this.track(trackIndex), clipIndex);
    if (!clip) throw new HostError("No clip in slot");
    return clip;
  }

  private device(trackIndex: number, deviceIndex: number): Device {
    const device = this.track(trackIndex).devices[deviceIndex];
    if (!device) throw new HostError("Device index out of range");
    return device;
  }

  private scene(i: number): { name: string } {
    const scene = this.session.scenes[i];
    if (!scene) throw new HostError("Scene index out of range");
    return scene;
  }

  private locator(i: number): { name: string; time: number } {
    const locator = this.session.locators[i];
    if (!locator) throw new HostError("Locator index out of range");
    return locator;
  }

  private insertTrack(kind: Track["kind"], at: number): JsonValue {
    const { tracks, scenes } = this.session;
    if (at > tracks.length) throw new HostError("Track index out of range");
    const position = at === -1 ? tracks.length : at;
    const track: Track = {
      name: `${tracks.length + 1}-${kind === "midi" ? "MIDI" : "Audio"}`,
      kind,
      color: 0,
      volume: UNITY_VOLUME,
      pan: 0,
      mute: false,
      solo: false,
      arm: false,
      slots: scenes.map(() => null),
      devices: [],
    };
    tracks.splice(position, 0, track);
    return { index: position, name: track.name };
  }

  private trackSummary(track: Track, i: number) {
    return {
      index: i,
      name: track.name,
      is_midi_track: track.kind === "midi",
      is_audio_track: track.kind === "audio",
      mute: track.mute,
      solo: track.solo,
      arm: track.arm,
      volume: track.volume,
      panning: track.pan,
    };
  }

  // ── Operations ──

  private buildOperations(): Partial<Record<CommandName, Operation>> {
    const s = () => this.session;

    return {
      // Session and transport
      get_session_info: op(
        "get_session_info",
        noArgs,
        () => ({
          tempo: s().tempo,
          signature_numerator: s().numerator,
          signature_denominator: s().denominator,
          track_count: s().tracks.length,
          scene_count: s().scenes.length,
          is_playing: s().playing,
          master_track: { name: "Master", volume: s().masterVolume, panning: 0 },
        }),
        false,
      ),
      set_tempo: op("set_tempo", z.object({ tempo: z.number().min(20).max(999) }), ({ tempo }) => {
        s().tempo = tempo;
        return { tempo };
      }),
      set_time_signature: op(
        "set_time_signature",
        z.object({
          numerator: z.number().int().min(1).max(99),
          denominator: z.union([z.literal(1), z.literal(2), z.literal(4), z.literal(8), z.literal(16)]),
        }),
        ({ numerator, denominator }) => {
          s().numerator = numerator;
          s().denominator = denominator;
          return { signature_numerator: numerator, signature_denominator: denominator };
        },
      ),
      set_metronome: op("set_metronome", z.object({ enabled: z.boolean() }), ({ enabled }) => {
        s().metronome = enabled;
        return { metronome: enabled };
      }),
      start_playback: op(
        "start_playback",
        noArgs,
        () => {
          s().playing = true;
          return { playing: true };
        },
        false,
      ),
      stop_playback: op(
        "stop_playback",
        noArgs,
        () => {
          s().playing = false;
          s().recording = false;
          for (const track of s().tracks) {
            for (const clip of track.slots) if (clip) clip.playing = false;
          }
          return { playing: false };
        },
        false,
      ),
      start_recording: op(
        "start_recording",
        noArgs,
        () => {
          s().recording = true;
          s().playing = true;
          return { recording: true };
        },
        false,
      ),
      stop_recording: op(
        "stop_recording",
        noArgs,
        () => {
          s().recording = false;
          return { recording: false };
        },
        false,
      ),
      get_playhead_position: op(
        "get_playhead_position",
        noArgs,
        () => ({ position: s().position }),
        false,
      ),
      set_playhead_position: op(
        "set_playhead_position",
        z.object({ time: z.number().min(0) }),
        ({ time }) => {
          s().position = time;
          return { position: time };
        },
        false,
      ),
      set_loop: op(
        "set_loop",
        z.object({
          enabled: z.boolean(),
          start: z.number().min(0).optional(),
          length: z.number().positive().optional(),
        }),
        ({ enabled, start, length }) => {
          const loop = s().loop;
          loop.enabled = enabled;
          if (start !== undefined) loop.start = start;
          if (length !== undefined) loop.length = length;
          return { enabled: loop.enabled, start: loop.start, length: loop.length };
        },
      ),
      undo: op("undo", noArgs, () => this.restore(this.undoStack, this.redoStack, "undo"), false),
      redo: op("redo", noArgs, () => this.restore(this.redoStack, this.undoStack, "redo"), false),

      // Locators
      create_locator: op(
        "create_locator",
        z.object({ time: z.number().min(0), name: z.string().optional() }),
        ({ time, name }) => {
          const locators = s().locators;
          const locator = { name: name ?? `Locator ${locators.length + 1}`, time };
          locators.push(locator);
          locators.sort((a, b) => a.time - b.time);
          return { index: locators.indexOf(locator), name: locator.name, time };
        },
      ),
      delete_locator: op("delete_locator", locatorArgs, ({ locator_index }) => {
        const { name } = this.locator(locator_index);
        s().locators.splice(locator_index, 1);
        return { deleted_locator: name };
      }),
      jump_to_locator: op(
        "jump_to_locator",
        locatorArgs,
        ({ locator_index }) => {
          s().position = this.locator(locator_index).time;
          return { position: s().position };
        },
        false,
      ),

      // Tracks
      get_track_info: op(
        "get_track_info",
        trackArgs,
        ({ track_index }) => {
          const track = this.track(track_index);
          return {
            ...this.trackSummary(track, track_index),
            color_index: track.color,
            clip_slots: track.slots.map((clip, i) => ({
              index: i,
              has_clip: clip !== null,
              clip: clip ? { name: clip.name, length: clip.length, is_playing: clip.playing } : null,
            })),
            devices: track.devices.map((d, i) => ({ index: i, name: d.name, class_name: d.className })),
          };
        },
        false,
      ),
      get_all_tracks: op(
        "get_all_tracks",
        noArgs,
        () => s().tracks.map((t, i) => this.trackSummary(t, i)),
        false,
      ),
      get_master_track_info: op(
        "get_master_track_info",
        noArgs,
        () => ({ name: "Master", volume: s().masterVolume, panning: 0 }),
        false,
      ),
      create_midi_track: op("create_midi_track", z.object({ index: insertAt }), ({ index: at }) =>
        this.insertTrack("midi", at),
      ),
      create_audio_track: op("create_audio_track", z.object({ index: insertAt }), ({ index: at }) =>
        this.insertTrack("audio", at),
      ),
      delete_track: op("delete_track", trackArgs, ({ track_index }) => {
        const { name } = this.track(track_index);
        s().tracks.splice(track_index, 1);
        return { deleted_index: track_index, deleted_track: name };
      }),
      delete_all_tracks: op("delete_all_tracks", noArgs, () => {
        const count = s().tracks.length;
        s().tracks = [];
        return { deleted_count: count };
      }),
      duplicate_track: op("duplicate_track", trackArgs, ({ track_index }) => {
        const copy = structuredClone(this.track(track_index));
        s().tracks.splice(track_index + 1, 0, copy);
        return { index: track_index + 1, name: copy.name };
      }),
      set_track_name: op(
        "set_track_name",
        trackArgs.extend({ name: z.string() }),
        ({ track_index, name }) => {
          this.track(track_index).name = name;
          return { name };
        },
      ),
      set_track_color: op(
        "set_track_color",
        trackArgs.extend({ color_index: z.number().int().min(0).max(69) }),
        ({ track_index, color_index }) => {
          this.track(track_index).color = color_index;
          return { color_index };
        },
      ),
      set_track_volume: op(
        "set_track_volume",
        trackArgs.extend({ volume: unit }),
        ({ track_index, volume }) => {
          const track = this.track(track_index);
          track.volume = volume;
          return { track_name: track.name, volume };
        },
      ),
      set_track_pan: op(
        "set_track_pan",
        trackArgs.extend({ pan: z.number().min(-1).max(1) }),
        ({ track_index, pan }) => {
          const track = this.track(track_index);
          track.pan = pan;
          return { track_name: track.name, pan };
        },
      ),
      set_track_mute: op(
        "set_track_mute",
        trackArgs.extend({ mute: z.boolean() }),
        ({ track_index, mute }) => {
          const track = this.track(track_index);
          track.mute = mute;
          return { track_name: track.name, mute };
        },
      ),
      set_track_solo: op(
        "set_track_solo",
        trackArgs.extend({ solo: z.boolean() }),
        ({ track_index, solo }) => {
          const track = this.track(track_index);
          track.solo = solo;
          return { track_name: track.name, solo };
        },
      ),
      set_track_arm: op(
        "set_track_arm",
        trackArgs.extend({ arm: z.boolean() }),
        ({ track_index, arm }) => {
          const track = this.track(track_index);
          track.arm = arm;
          return { track_name: track.name, arm };
        },
      ),
      set_master_volume: op("set_master_volume", z.object({ volume: unit }), ({ volume }) => {
        s().masterVolume = volume;
        return { volume };
      }),

      // Clips
      get_all_clips_in_track: op(
        "get_all_clips_in_track",
        trackArgs,
        ({ track_index }) =>
          this.track(track_index).slots.flatMap((clip, i) =>
            clip ? [{ index: i, name: clip.name, length: clip.length, is_playing: clip.playing }] : [],
          ),
        false,
      ),
      create_clip: op(
        "create_clip",
        slotArgs.extend({ length: z.number().positive().default(4) }),
        ({ track_index, clip_index, length }) => {
          const track = this.track(track_index);
          if (this.slotOf(track, clip_index).clip) throw new HostError("Clip slot already has a clip");
          const clip: Clip = { name: "", length, launchMode: "trigger", playing: false, notes: [] };
          track.slots[clip_index] = clip;
          return { name: clip.name, length };
        },
      ),
      delete_clip: op("delete_clip", slotArgs, ({ track_index, clip_index }) => {
        const { name } = this.clip(track_index, clip_index);
        this.track(track_index).slots[clip_index] = null;
        return { deleted_clip: name };
      }),
      fire_clip: op(
        "fire_clip",
        slotArgs,
        ({ track_index, clip_index }) => {
          const target = this.clip(track_index, clip_index);
          for (const clip of this.track(track_index).slots) if (clip) clip.playing = clip === target;
          s().playing = true;
          return { fired: true };
        },
        false,
      ),
      stop_clip: op(
        "stop_clip",
        slotArgs,
        ({ track_index, clip_index }) => {
          this.clip(track_index, clip_index).playing = false;
          return { stopped: true };
        },
        false,
      ),
      set_clip_name: op(
        "set_clip_name",
        slotArgs.extend({ name: z.string() }),
        ({ track_index, clip_index, name }) => {
          this.clip(track_index, clip_index).name = name;
          return { name };
        },
      ),
      set_clip_launch_mode: op(
        "set_clip_launch_mode",
        slotArgs.extend({ mode: z.enum(LAUNCH_MODES) }),
        ({ track_index, clip_index, mode }) => {
          this.clip(track_index, clip_index).launchMode = mode;
          return { launch_mode: mode };
        },
      ),
      get_clip_notes: op(
        "get_clip_notes",
        slotArgs,
        ({ track_index, clip_index }) => ({
          notes: this.clip(track_index, clip_index).notes.map((n) => ({ ...n })),
        }),
        false,
      ),
      add_notes_to_clip: op(
        "add_notes_to_clip",
        slotArgs.extend({ notes: z.array(noteSchema) }),
        ({ track_index, clip_index, notes }) => {
          const clip = this.clip(track_index, clip_index);
          clip.notes.push(...notes);
          clip.notes.sort((a, b) => a.start_time - b.start_time || a.pitch - b.pitch);
          return { note_count: notes.length };
        },
      ),

      // Scenes
      get_all_scenes: op(
        "get_all_scenes",
        noArgs,
        () => s().scenes.map((scene, i) => ({ index: i, name: scene.name })),
        false,
      ),
      create_scene: op("create_scene", z.object({ index: insertAt }), ({ index: at }) => {
        const { scenes, tracks } = s();
        if (at > scenes.length) throw new HostError("Scene index out of range");
        const position = at === -1 ? scenes.length : at;
        scenes.splice(position, 0, { name: "" });
        for (const track of tracks) track.slots.splice(position, 0, null);
        return { scene_index: position };
      }),
      delete_scene: op("delete_scene", sceneArgs, ({ scene_index }) => {
        this.scene(scene_index);
        s().scenes.splice(scene_index, 1);
        for (const track of s().tracks) track.slots.splice(scene_index, 1);
        return { deleted_scene_index: scene_index };
      }),
      set_scene_name: op(
        "set_scene_name",
        sceneArgs.extend({ name: z.string() }),
        ({ scene_index, name }) => {
          this.scene(scene_index).name = name;
          return { name };
        },
      ),
      fire_scene: op(
        "fire_scene",
        sceneArgs,
        ({ scene_index }) => {
          this.scene(scene_index);
          for (const track of s().tracks) {
            track.slots.forEach((clip, i) => {
              if (clip) clip.playing = i === scene_index;
            });
          }
          s().playing = true;
          return { fired: true };
        },
        false,
      ),

      // Devices
      load_browser_item: op(
        "load_browser_item",
        trackArgs.extend({ uri: z.string().min(1) }),
        ({ track_index, uri }) => {
          const track = this.track(track_index);
          const name = uri.split(/[:#/]/).filter(Boolean).pop() ?? uri;
          track.devices.push({
            name,
            className: track.kind === "midi" ? "InstrumentGroupDevice" : "AudioEffectGroupDevice",
            parameters: [
              { name: "Device On", value: 1, min: 0, max: 1 },
              ...Array.from({ length: MACRO_COUNT }, (_, i) => ({
                name: `Macro ${i + 1}`,
                value: 0,
                min: 0,
                max: 1,
              })),
            ],
          });
          return { loaded: true, device_index: track.devices.length - 1, device_name: name };
        },
      ),
      get_device_parameters: op(
        "get_device_parameters",
        deviceArgs,
        ({ track_index, device_index }) => {
          const device = this.device(track_index, device_index);
          return {
            device_name: device.name,
            parameters: device.parameters.map((p, i) => ({ index: i, ...p })),
          };
        },
        false,
      ),
      set_device_parameter: op(
        "set_device_parameter",
        deviceArgs.extend({ parameter_index: index, value: unit }),
        ({ track_index, device_index, parameter_index, value }) => {
          const device = this.device(track_index, device_index);
          const parameter = device.parameters[parameter_index];
          if (!parameter) throw new HostError("Parameter index out of range");
          parameter.value = parameter.min + value * (parameter.max - parameter.min);
          return {
            device_name: device.name,
            parameter_index,
            parameter_name: parameter.name,
            value,
          };
        },
      ),
      toggle_device_bypass: op("toggle_device_bypass", deviceArgs, ({ track_index, device_index }) => {
        const device = this.device(track_index, device_index);
        const onOff = device.parameters[0];
        if (!onOff) throw new HostError("Device has no parameters");
        onOff.value = onOff.value > 0 ? 0 : 1;
        return { device_name: device.name, enabled: onOff.value > 0 };
      }),
      delete_device: op("delete_device", deviceArgs, ({ track_index, device_index }) => {
        const { name } = this.device(track_index, device_index);
        this.track(track_index).devices.splice(device_index, 1);
        return { deleted_device: name };
      }),
    };
  }

  private restore(from: Session[], to: Session[], action: "undo" | "redo"): JsonValue {
    const previous = from.pop();
    if (!previous) throw new HostError(`Nothing to ${action}`);
    to.push(this.session);
    this.session = previous;
    return action === "undo" ? { undone: true } : { redone: true };
  }
}
