/**
 * Command model shared by both transports, the classifier and the serializer.
 * @module
 */

import type { CompletionHandle } from "../core/completion-handle.js";
import type { ErrorKind } from "../errors.js";

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type Transport = "tcp" | "udp";

/**
 * `critical` commands are destructive, create or delete durable state, or must
 * report their outcome. `reversible` commands can be fully corrected by a later
 * command of the same shape.
 */
export type Criticality = "critical" | "reversible";

/** Every operation the host control surface exposes. */
export const COMMAND_NAMES = [
  // Session and transport
  "get_session_info",
  "get_session_overview",
  "set_tempo",
  "set_time_signature",
  "set_metronome",
  "start_playback",
  "stop_playback",
  "start_recording",
  "stop_recording",
  "get_playhead_position",
  "set_playhead_position",
  "set_loop",
  "undo",
  "redo",
  // Locators
  "create_locator",
  "delete_locator",
  "jump_to_locator",
  // Tracks
  "get_track_info",
  "get_all_tracks",
  "get_master_track_info",
  "get_return_tracks",
  "create_midi_track",
  "create_audio_track",
  "delete_track",
  "delete_all_tracks",
  "duplicate_track",
  "group_tracks",
  "ungroup_tracks",
  "set_track_name",
  "set_track_color",
  "set_track_fold",
  "set_track_volume",
  "set_track_pan",
  "set_track_mute",
  "set_track_solo",
  "set_track_arm",
  "set_track_monitoring_state",
  "set_send_amount",
  "set_master_volume",
  // Clips
  "get_all_clips_in_track",
  "create_clip",
  "delete_clip",
  "duplicate_clip",
  "duplicate_clip_to",
  "move_clip",
  "fire_clip",
  "stop_clip",
  "set_clip_name",
  "set_clip_loop",
  "set_clip_launch_mode",
  "set_clip_follow_action",
  "get_clip_follow_actions",
  "mix_clip",
  "stretch_clip",
  "crop_clip",
  "resize_clip",
  "set_clip_warp_mode",
  "get_clip_warp_markers",
  "add_warp_marker",
  "delete_warp_marker",
  "get_clip_envelopes",
  // Notes
  "get_clip_notes",
  "add_notes_to_clip",
  "delete_notes_from_clip",
  "quantize_clip",
  "transpose_clip",
  "set_note_velocity",
  "set_note_duration",
  "set_note_pitch",
  // Scenes
  "get_all_scenes",
  "create_scene",
  "delete_scene",
  "duplicate_scene",
  "set_scene_name",
  "fire_scene",
  // Devices and automation
  "get_device_parameters",
  "set_device_parameter",
  "toggle_device_bypass",
  "duplicate_device",
  "delete_device",
  "move_device",
  "add_automation_point",
  "clear_automation",
  // Browser and presets
  "get_browser_tree",
  "get_browser_items_at_path",
  "load_browser_item",
  "load_instrument_preset",
] as const;

export type CommandName = (typeof COMMAND_NAMES)[number];

const COMMAND_NAME_SET: ReadonlySet<string> = new Set(COMMAND_NAMES);

export function isCommandName(value: string): value is CommandName {
  return COMMAND_NAME_SET.has(value);
}

export type CommandParams = Readonly<JsonObject>;

/** One parsed inbound request. Frozen at creation. */
export interface Command {
  readonly name: CommandName;
  readonly params: CommandParams;
  readonly transport: Transport;
  /** Epoch milliseconds at which the complete message was parsed. */
  readonly receivedAt: number;
}

export interface ClassificationEntry {
  readonly commandName: CommandName;
  readonly allowedTransports: readonly Transport[];
  readonly criticality: Criticality;
}

// ── Outcomes ──

export interface SuccessEnvelope {
  status: "success";
  result: JsonValue;
}

export interface ErrorEnvelope {
  status: "error";
  message: string;
  kind?: ErrorKind;
}

/** The only two outcomes a client can observe. */
export type Outcome = SuccessEnvelope | ErrorEnvelope;

/**
 * Unit of work for the serializer. TCP tasks carry the handle their
 * connection waits on; UDP tasks never do.
 */
export interface ExecutionTask {
  readonly command: Command;
  readonly completion?: CompletionHandle<Outcome>;
}
