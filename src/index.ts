export {
  ChannelModeController,
  createParserState,
  decodeByte,
  decodeBytes,
  getActiveChannel,
  initParserState,
  isMidiChannel,
  MidiController,
  MidiStatus,
  MidiStreamParser,
  REALTIME_STATUS_BYTES,
  resetParserState,
  setActiveChannel,
  UNDEFINED_STATUS_BYTES,
} from "./midi";

export { parseHexDump } from "./hex";

export type {
  ChannelMessage,
  ChannelModeKind,
  ChannelVoiceKind,
  DecodeOptions,
  MessageKind,
  MidiChannel,
  MidiControllerNumber,
  MidiMessage,
  MidiParserState,
  RealtimeKind,
  RunningStatus,
  SystemCommonKind,
  SystemMessage,
} from "./midi";
