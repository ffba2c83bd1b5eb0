// midi.ts — zero-dep, byte-at-a-time MIDI 1.0 stream decoder (TypeScript)

export type MidiChannel =
  | 0
  | 1
  | 2
  | 3
  | 4
  | 5
  | 6
  | 7
  | 8
  | 9
  | 10
  | 11
  | 12
  | 13
  | 14
  | 15;

export type ChannelVoiceKind =
  | "noteOff"
  | "noteOn"
  | "polyKeyPressure"
  | "controlChange"
  | "programChange"
  | "channelPressure"
  | "pitchBend";

export type ChannelModeKind =
  | "allSoundOff"
  | "resetAllControllers"
  | "localControl"
  | "allNotesOff"
  | "omniOff"
  | "omniOn"
  | "monoOn"
  | "polyOn";

export type SystemCommonKind =
  | "mtcQuarterFrame"
  | "songPositionPointer"
  | "songSelect"
  | "tuneRequest"
  | "endOfExclusive";

export type RealtimeKind =
  | "timingClock"
  | "start"
  | "continue"
  | "stop"
  | "activeSense"
  | "systemReset";

export type MessageKind =
  | ChannelVoiceKind
  | ChannelModeKind
  | SystemCommonKind
  | RealtimeKind
  | "systemExclusive";

/** Kinds that can sit in running status and consume data bytes. */
export type RunningStatus =
  | ChannelVoiceKind
  | "systemExclusive"
  | "mtcQuarterFrame"
  | "songPositionPointer"
  | "songSelect";

export type ChannelMessage =
  | {
      type: "noteOff";
      channel: MidiChannel;
      note: number;
      velocity: number;
    }
  | {
      type: "noteOn";
      channel: MidiChannel;
      note: number;
      velocity: number;
    }
  | {
      type: "polyKeyPressure";
      channel: MidiChannel;
      key: number;
      pressure: number;
    }
  | {
      type: "controlChange" | ChannelModeKind;
      channel: MidiChannel;
      controller: number;
      value: number;
    }
  | {
      type: "programChange";
      channel: MidiChannel;
      program: number;
    }
  | {
      type: "channelPressure";
      channel: MidiChannel;
      pressure: number;
    }
  | {
      type: "pitchBend";
      channel: MidiChannel;
      value: number; // 14-bit, 0x2000 = center
    };

export type SystemMessage =
  | {
      type: "mtcQuarterFrame";
      channel: null;
      mtcType: number;
      mtcValue: number;
    }
  | {
      type: "songPositionPointer";
      channel: null;
      position: number; // 14-bit, in MIDI beats
    }
  | {
      type: "songSelect";
      channel: null;
      song: number;
    }
  | {
      type:
        | "systemExclusive"
        | "tuneRequest"
        | "endOfExclusive"
        | RealtimeKind;
      channel: null;
    };

export type MidiMessage = ChannelMessage | SystemMessage;

export interface MidiParserState {
  status: RunningStatus | null;
  channel: MidiChannel | null;
  /** Stored for callers that filter by channel; decoding never reads it. */
  activeChannel: MidiChannel | null;
  buffer: Uint8Array;
  byteCount: number;
}

export interface DecodeOptions {
  normalizeZeroVelocityNoteOn?: boolean;
  detectChannelMode?: boolean;
}

export const MidiStatus = {
  NoteOff: 0x80,
  NoteOn: 0x90,
  PolyKeyPressure: 0xa0,
  ControlChange: 0xb0,
  ProgramChange: 0xc0,
  ChannelPressure: 0xd0,
  PitchBend: 0xe0,
  SystemExclusive: 0xf0,
  MtcQuarterFrame: 0xf1,
  SongPositionPointer: 0xf2,
  SongSelect: 0xf3,
  TuneRequest: 0xf6,
  EndOfExclusive: 0xf7,
  TimingClock: 0xf8,
  Start: 0xfa,
  Continue: 0xfb,
  Stop: 0xfc,
  ActiveSense: 0xfe,
  SystemReset: 0xff,
} as const;

/** Controller numbers with a defined meaning in MIDI 1.0. */
export const MidiController = {
  BankSelect: 0x00,
  ModWheel: 0x01,
  BreathController: 0x02,
  FootController: 0x04,
  PortamentoTime: 0x05,
  DataEntryMsb: 0x06,
  ChannelVolume: 0x07,
  Balance: 0x08,
  Pan: 0x0a,
  ExpressionController: 0x0b,
  EffectControl1: 0x0c,
  EffectControl2: 0x0d,
  GeneralPurpose1: 0x10,
  GeneralPurpose2: 0x11,
  GeneralPurpose3: 0x12,
  GeneralPurpose4: 0x13,
  BankSelectLsb: 0x20,
  ModWheelLsb: 0x21,
  BreathControllerLsb: 0x22,
  FootControllerLsb: 0x24,
  PortamentoTimeLsb: 0x25,
  DataEntryLsb: 0x26,
  ChannelVolumeLsb: 0x27,
  BalanceLsb: 0x28,
  PanLsb: 0x2a,
  ExpressionControllerLsb: 0x2b,
  EffectControl1Lsb: 0x2c,
  EffectControl2Lsb: 0x2d,
  GeneralPurpose1Lsb: 0x30,
  GeneralPurpose2Lsb: 0x31,
  GeneralPurpose3Lsb: 0x32,
  GeneralPurpose4Lsb: 0x33,
  SustainPedal: 0x40,
  PortamentoOnOff: 0x41,
  Sostenuto: 0x42,
  SoftPedal: 0x43,
  LegatoFootswitch: 0x44,
  Hold2: 0x45,
  SoundVariation: 0x46,
  SoundTimbre: 0x47,
  SoundReleaseTime: 0x48,
  SoundAttackTime: 0x49,
  SoundBrightness: 0x4a,
  SoundController6: 0x4b,
  SoundController7: 0x4c,
  SoundController8: 0x4d,
  SoundController9: 0x4e,
  SoundController10: 0x4f,
  GeneralPurpose5: 0x50,
  GeneralPurpose6: 0x51,
  GeneralPurpose7: 0x52,
  GeneralPurpose8: 0x53,
  PortamentoControl: 0x54,
  Effect1Depth: 0x5b,
  Effect2Depth: 0x5c,
  Effect3Depth: 0x5d,
  Effect4Depth: 0x5e,
  Effect5Depth: 0x5f,
  DataIncrement: 0x60,
  DataDecrement: 0x61,
  NrpnLsb: 0x62,
  NrpnMsb: 0x63,
  RpnLsb: 0x64,
  RpnMsb: 0x65,
  AllSoundOff: 0x78,
  ResetAllControllers: 0x79,
  LocalControl: 0x7a,
  AllNotesOff: 0x7b,
  OmniOff: 0x7c,
  OmniOn: 0x7d,
  MonoOn: 0x7e,
  PolyOn: 0x7f,
} as const;

export type MidiControllerNumber =
  (typeof MidiController)[keyof typeof MidiController];

// Controllers 120-127, reinterpreted as channel mode messages
export const ChannelModeController = {
  AllSoundOff: MidiController.AllSoundOff,
  ResetAllControllers: MidiController.ResetAllControllers,
  LocalControl: MidiController.LocalControl,
  AllNotesOff: MidiController.AllNotesOff,
  OmniOff: MidiController.OmniOff,
  OmniOn: MidiController.OmniOn,
  MonoOn: MidiController.MonoOn,
  PolyOn: MidiController.PolyOn,
} as const;

export const REALTIME_STATUS_BYTES: readonly number[] = [
  MidiStatus.TimingClock,
  MidiStatus.Start,
  MidiStatus.Continue,
  MidiStatus.Stop,
  MidiStatus.ActiveSense,
  MidiStatus.SystemReset,
];

export const UNDEFINED_STATUS_BYTES: readonly number[] = [
  0xf4, 0xf5, 0xf9, 0xfd,
];

const BUFFER_SIZE = 2;
const MAX_DATA_BYTE = 0x7f;

// Indexed by controller number - 120.
const CHANNEL_MODE_KINDS: readonly ChannelModeKind[] = [
  "allSoundOff",
  "resetAllControllers",
  "localControl",
  "allNotesOff",
  "omniOff",
  "omniOn",
  "monoOn",
  "polyOn",
];

const DATA_LENGTH: Record<RunningStatus, 0 | 1 | 2> = {
  noteOff: 2,
  noteOn: 2,
  polyKeyPressure: 2,
  controlChange: 2,
  programChange: 1,
  channelPressure: 1,
  pitchBend: 2,
  systemExclusive: 0,
  mtcQuarterFrame: 1,
  songPositionPointer: 2,
  songSelect: 1,
};

function resolveOptions(options: DecodeOptions = {}): Required<DecodeOptions> {
  return {
    normalizeZeroVelocityNoteOn: options.normalizeZeroVelocityNoteOn ?? true,
    detectChannelMode: options.detectChannelMode ?? true,
  };
}

export function isMidiChannel(value: number): value is MidiChannel {
  return Number.isInteger(value) && value >= 0 && value <= 15;
}

export function createParserState(): MidiParserState {
  return {
    status: null,
    channel: null,
    activeChannel: null,
    buffer: new Uint8Array(BUFFER_SIZE),
    byteCount: 0,
  };
}

export function initParserState(state: MidiParserState): void {
  if (!state) return;
  state.status = null;
  state.channel = null;
  state.activeChannel = null;
  state.buffer.fill(0);
  state.byteCount = 0;
}

/** Drops running status and any partially received message. */
export function resetParserState(state: MidiParserState): void {
  initParserState(state);
}

export function setActiveChannel(
  state: MidiParserState,
  channel: MidiChannel | null,
): void {
  if (!state) return;
  if (channel !== null && !isMidiChannel(channel)) return;
  state.activeChannel = channel;
}

export function getActiveChannel(state: MidiParserState): MidiChannel | null {
  return state ? state.activeChannel : null;
}

/**
 * Feeds one byte into the decoder.
 *
 * Returns the message the byte completed, or `null` while a message is still
 * being assembled, for SysEx payload, and for bytes that carry no meaning in
 * the current state. Never throws.
 */
export function decodeByte(
  state: MidiParserState,
  byte: number,
  options?: DecodeOptions,
): MidiMessage | null {
  return decodeWith(state, byte, resolveOptions(options));
}

function decodeWith(
  state: MidiParserState,
  byte: number,
  opts: Required<DecodeOptions>,
): MidiMessage | null {
  if (!state) return null;
  if (!Number.isInteger(byte) || byte < 0 || byte > 0xff) return null;

  if (byte & 0x80) {
    return parseStatusByte(state, byte);
  }
  return parseDataByte(state, byte, opts);
}

function beginStatus(
  state: MidiParserState,
  status: RunningStatus | null,
  channel: MidiChannel | null,
): void {
  state.status = status;
  state.channel = channel;
  state.byteCount = 0;
}

function parseStatusByte(
  state: MidiParserState,
  byte: number,
): MidiMessage | null {
  const low = byte & 0x0f;
  const channel = isMidiChannel(low) ? low : null;

  switch (byte & 0xf0) {
    case 0x80:
      beginStatus(state, "noteOff", channel);
      return null;
    case 0x90:
      beginStatus(state, "noteOn", channel);
      return null;
    case 0xa0:
      beginStatus(state, "polyKeyPressure", channel);
      return null;
    case 0xb0:
      beginStatus(state, "controlChange", channel);
      return null;
    case 0xc0:
      beginStatus(state, "programChange", channel);
      return null;
    case 0xd0:
      beginStatus(state, "channelPressure", channel);
      return null;
    case 0xe0:
      beginStatus(state, "pitchBend", channel);
      return null;
  }

  // System messages match on the full byte
  switch (byte) {
    case MidiStatus.SystemExclusive:
      beginStatus(state, "systemExclusive", null);
      return { type: "systemExclusive", channel: null };

    case MidiStatus.MtcQuarterFrame:
      beginStatus(state, "mtcQuarterFrame", null);
      return null;
    case MidiStatus.SongPositionPointer:
      beginStatus(state, "songPositionPointer", null);
      return null;
    case MidiStatus.SongSelect:
      beginStatus(state, "songSelect", null);
      return null;

    case MidiStatus.TuneRequest:
      beginStatus(state, null, null);
      return { type: "tuneRequest", channel: null };
    case MidiStatus.EndOfExclusive:
      beginStatus(state, null, null);
      return { type: "endOfExclusive", channel: null };

    // Real-time: running status and accumulation stay as they are
    case MidiStatus.TimingClock:
      return { type: "timingClock", channel: null };
    case MidiStatus.Start:
      return { type: "start", channel: null };
    case MidiStatus.Continue:
      return { type: "continue", channel: null };
    case MidiStatus.Stop:
      return { type: "stop", channel: null };
    case MidiStatus.ActiveSense:
      return { type: "activeSense", channel: null };
    case MidiStatus.SystemReset:
      return { type: "systemReset", channel: null };

    default:
      // 0xF4, 0xF5, 0xF9, 0xFD
      return null;
  }
}

/** Stores a data byte; true once the pending message has both bytes. */
function accumulate(state: MidiParserState, byte: number): boolean {
  state.buffer[state.byteCount] = byte;
  state.byteCount += 1;
  if (state.byteCount < BUFFER_SIZE) return false;
  state.byteCount = 0;
  return true;
}

function parseDataByte(
  state: MidiParserState,
  byte: number,
  opts: Required<DecodeOptions>,
): MidiMessage | null {
  if (byte > MAX_DATA_BYTE) return null;

  const { status, channel } = state;
  if (status === null) return null;

  const required = DATA_LENGTH[status];
  if (
    state.byteCount < 0 ||
    state.byteCount >= BUFFER_SIZE ||
    (required > 0 && state.byteCount >= required)
  ) {
    state.byteCount = 0;
    return null;
  }

  switch (status) {
    case "systemExclusive":
      return null;

    case "mtcQuarterFrame":
      beginStatus(state, null, null);
      return {
        type: "mtcQuarterFrame",
        channel: null,
        mtcType: byte >> 4,
        mtcValue: byte & 0x0f,
      };

    case "songSelect":
      beginStatus(state, null, null);
      return { type: "songSelect", channel: null, song: byte };

    case "songPositionPointer": {
      if (!accumulate(state, byte)) return null;
      const [lsb = 0, msb = 0] = state.buffer;
      beginStatus(state, null, null);
      return {
        type: "songPositionPointer",
        channel: null,
        position: (msb << 7) | lsb,
      };
    }
  }

  // Channel voice messages always carry the channel of their status byte
  if (channel === null) return null;

  switch (status) {
    case "programChange":
      state.byteCount = 0;
      return { type: "programChange", channel, program: byte };

    case "channelPressure":
      state.byteCount = 0;
      return { type: "channelPressure", channel, pressure: byte };

    case "noteOff": {
      if (!accumulate(state, byte)) return null;
      const [note = 0, velocity = 0] = state.buffer;
      return { type: "noteOff", channel, note, velocity };
    }

    case "noteOn": {
      if (!accumulate(state, byte)) return null;
      const [note = 0, velocity = 0] = state.buffer;
      if (opts.normalizeZeroVelocityNoteOn && velocity === 0) {
        return { type: "noteOff", channel, note, velocity };
      }
      return { type: "noteOn", channel, note, velocity };
    }

    case "polyKeyPressure": {
      if (!accumulate(state, byte)) return null;
      const [key = 0, pressure = 0] = state.buffer;
      return { type: "polyKeyPressure", channel, key, pressure };
    }

    case "controlChange": {
      if (!accumulate(state, byte)) return null;
      const [controller = 0, value = 0] = state.buffer;
      const mode = opts.detectChannelMode
        ? CHANNEL_MODE_KINDS[controller - ChannelModeController.AllSoundOff]
        : undefined;
      return { type: mode ?? "controlChange", channel, controller, value };
    }

    case "pitchBend": {
      if (!accumulate(state, byte)) return null;
      const [lsb = 0, msb = 0] = state.buffer;
      return { type: "pitchBend", channel, value: (msb << 7) | lsb };
    }
  }
}

/**
 * Stateful wrapper for one input stream. Holds its own parser state and
 * resolved options.
 */
export class MidiStreamParser {
  private readonly state: MidiParserState = createParserState();
  private readonly opts: Required<DecodeOptions>;

  constructor(options: DecodeOptions = {}) {
    this.opts = resolveOptions(options);
  }

  get activeChannel(): MidiChannel | null {
    return getActiveChannel(this.state);
  }

  set activeChannel(channel: MidiChannel | null) {
    setActiveChannel(this.state, channel);
  }

  /** Read-only view of the running status and accumulation count. */
  get runningStatus(): RunningStatus | null {
    return this.state.status;
  }

  get pendingByteCount(): number {
    return this.state.byteCount;
  }

  push(byte: number): MidiMessage | null {
    return decodeWith(this.state, byte, this.opts);
  }

  feed(bytes: ArrayBuffer | Uint8Array | readonly number[]): MidiMessage[] {
    const input = bytes instanceof ArrayBuffer ? new Uint8Array(bytes) : bytes;
    const messages: MidiMessage[] = [];
    for (const byte of input) {
      const message = this.push(byte);
      if (message) messages.push(message);
    }
    return messages;
  }

  reset(): void {
    resetParserState(this.state);
  }
}

export function decodeBytes(
  input: ArrayBuffer | Uint8Array | readonly number[],
  opts: DecodeOptions = {},
): MidiMessage[] {
  const parser = new MidiStreamParser(opts);
  return parser.feed(input);
}
