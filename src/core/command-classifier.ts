/**
 * Static transport policy for every host command.
 *
 * A command may travel over UDP only when it is reversible (a later command of
 * the same shape overwrites it), returns nothing the caller needs, carries a
 * small payload and is sent at control-loop rates. Everything else is
 * TCP-only. Unknown names are rejected and never treated as UDP-eligible.
 */

import { TransportNotAllowedError, UnknownCommandError } from "../errors.js";
import type {
  ClassificationEntry,
  CommandName,
  Criticality,
  Transport,
} from "../types/commands.js";
import { COMMAND_NAMES, isCommandName } from "../types/commands.js";

type Policy = "udp" | "tcp-reversible" | "tcp-critical";

const POLICY: { readonly [K in CommandName]: Policy } = {
  // High-frequency, overwritable parameter updates
  set_device_parameter: "udp",
  set_track_volume: "udp",
  set_track_pan: "udp",
  set_track_mute: "udp",
  set_track_solo: "udp",
  set_track_arm: "udp",
  set_clip_launch_mode: "udp",
  set_master_volume: "udp",
  fire_clip: "udp",

  // Overwritable, but low-frequency: no latency win from a lossy channel
  set_tempo: "tcp-reversible",
  set_time_signature: "tcp-reversible",
  set_metronome: "tcp-reversible",
  start_playback: "tcp-reversible",
  stop_playback: "tcp-reversible",
  set_playhead_position: "tcp-reversible",
  set_loop: "tcp-reversible",
  jump_to_locator: "tcp-reversible",
  set_track_name: "tcp-reversible",
  set_track_color: "tcp-reversible",
  set_track_fold: "tcp-reversible",
  set_track_monitoring_state: "tcp-reversible",
  set_send_amount: "tcp-reversible",
  stop_clip: "tcp-reversible",
  set_clip_name: "tcp-reversible",
  set_clip_loop: "tcp-reversible",
  set_clip_follow_action: "tcp-reversible",
  set_clip_warp_mode: "tcp-reversible",
  set_scene_name: "tcp-reversible",
  fire_scene: "tcp-reversible",
  toggle_device_bypass: "tcp-reversible",

  // Reads: the caller must consume the result
  get_session_info: "tcp-critical",
  get_session_overview: "tcp-critical",
  get_playhead_position: "tcp-critical",
  get_track_info: "tcp-critical",
  get_all_tracks: "tcp-critical",
  get_master_track_info: "tcp-critical",
  get_return_tracks: "tcp-critical",
  get_all_clips_in_track: "tcp-critical",
  get_clip_follow_actions: "tcp-critical",
  get_clip_warp_markers: "tcp-critical",
  get_clip_envelopes: "tcp-critical",
  get_clip_notes: "tcp-critical",
  get_all_scenes: "tcp-critical",
  get_device_parameters: "tcp-critical",
  get_browser_tree: "tcp-critical",
  get_browser_items_at_path: "tcp-critical",

  // Structural, destructive or history-changing
  undo: "tcp-critical",
  redo: "tcp-critical",
  start_recording: "tcp-critical",
  stop_recording: "tcp-critical",
  create_locator: "tcp-critical",
  delete_locator: "tcp-critical",
  create_midi_track: "tcp-critical",
  create_audio_track: "tcp-critical",
  delete_track: "tcp-critical",
  delete_all_tracks: "tcp-critical",
  duplicate_track: "tcp-critical",
  group_tracks: "tcp-critical",
  ungroup_tracks: "tcp-critical",
  create_clip: "tcp-critical",
  delete_clip: "tcp-critical",
  duplicate_clip: "tcp-critical",
  duplicate_clip_to: "tcp-critical",
  move_clip: "tcp-critical",
  mix_clip: "tcp-critical",
  stretch_clip: "tcp-critical",
  crop_clip: "tcp-critical",
  resize_clip: "tcp-critical",
  add_warp_marker: "tcp-critical",
  delete_warp_marker: "tcp-critical",
  add_notes_to_clip: "tcp-critical",
  delete_notes_from_clip: "tcp-critical",
  quantize_clip: "tcp-critical",
  transpose_clip: "tcp-critical",
  set_note_velocity: "tcp-critical",
  set_note_duration: "tcp-critical",
  set_note_pitch: "tcp-critical",
  create_scene: "tcp-critical",
  delete_scene: "tcp-critical",
  duplicate_scene: "tcp-critical",
  duplicate_device: "tcp-critical",
  delete_device: "tcp-critical",
  move_device: "tcp-critical",
  add_automation_point: "tcp-critical",
  clear_automation: "tcp-critical",
  load_browser_item: "tcp-critical",
  load_instrument_preset: "tcp-critical",
};

const TCP_AND_UDP: readonly Transport[] = Object.freeze(["tcp", "udp"]);
const TCP_ONLY: readonly Transport[] = Object.freeze(["tcp"]);

function toEntry(commandName: CommandName, policy: Policy): ClassificationEntry {
  const criticality: Criticality = policy === "tcp-critical" ? "critical" : "reversible";
  return Object.freeze({
    commandName,
    allowedTransports: policy === "udp" ? TCP_AND_UDP : TCP_ONLY,
    criticality,
  });
}

const TABLE: ReadonlyMap<string, ClassificationEntry> = new Map(
  COMMAND_NAMES.map((name) => [name, toEntry(name, POLICY[name])]),
);

/** Look up a command's classification. `undefined` means unknown. */
export function classify(commandName: string): ClassificationEntry | undefined {
  return TABLE.get(commandName);
}

export type TransportCheck =
  | { ok: true; entry: ClassificationEntry }
  | { ok: false; error: UnknownCommandError | TransportNotAllowedError };

/** Classify and verify that `transport` may carry the command. */
export function checkTransport(commandName: string, transport: Transport): TransportCheck {
  const entry = isCommandName(commandName) ? classify(commandName) : undefined;
  if (!entry) {
    return { ok: false, error: new UnknownCommandError(commandName) };
  }
  if (!entry.allowedTransports.includes(transport)) {
    return { ok: false, error: new TransportNotAllowedError(commandName, transport) };
  }
  return { ok: true, entry };
}

export function isUdpEligible(commandName: string): boolean {
  return classify(commandName)?.allowedTransports.includes("udp") ?? false;
}

/** All entries, for diagnostics and tests. */
export function classificationTable(): readonly ClassificationEntry[] {
  return [...TABLE.values()];
}
