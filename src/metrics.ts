export type TunnelMetricsSnapshot = {
  connectAttempts: number;
  connectionsEstablished: number;
  authRejections: number;
  framesIn: number;
  framesOut: number;
  bytesIn: number;
  bytesOut: number;
  channelsOpened: number;
  channelsActive: number;
  channelOpenFailures: number;
  protocolErrors: number;
  unknownFlagFrames: number;
  unknownChannelFrames: number;
};

export interface TunnelMetrics {
  incConnectAttempt: () => void;
  incConnectionEstablished: () => void;
  incAuthRejection: () => void;
  addFrameIn: (payloadBytes: number) => void;
  addFrameOut: (payloadBytes: number) => void;
  incChannelOpened: () => void;
  setChannelsActive: (count: number) => void;
  incChannelOpenFailure: () => void;
  incProtocolError: () => void;
  incUnknownFlag: () => void;
  incUnknownChannel: () => void;
  snapshot: () => TunnelMetricsSnapshot;
}

export function createTunnelMetrics(): TunnelMetrics {
  const counters: TunnelMetricsSnapshot = {
    connectAttempts: 0,
    connectionsEstablished: 0,
    authRejections: 0,
    framesIn: 0,
    framesOut: 0,
    bytesIn: 0,
    bytesOut: 0,
    channelsOpened: 0,
    channelsActive: 0,
    channelOpenFailures: 0,
    protocolErrors: 0,
    unknownFlagFrames: 0,
    unknownChannelFrames: 0
  };

  return {
    incConnectAttempt: () => {
      counters.connectAttempts += 1;
    },
    incConnectionEstablished: () => {
      counters.connectionsEstablished += 1;
    },
    incAuthRejection: () => {
      counters.authRejections += 1;
    },
    addFrameIn: (payloadBytes) => {
      counters.framesIn += 1;
      counters.bytesIn += payloadBytes;
    },
    addFrameOut: (payloadBytes) => {
      counters.framesOut += 1;
      counters.bytesOut += payloadBytes;
    },
    incChannelOpened: () => {
      counters.channelsOpened += 1;
    },
    setChannelsActive: (count) => {
      counters.channelsActive = count;
    },
    incChannelOpenFailure: () => {
      counters.channelOpenFailures += 1;
    },
    incProtocolError: () => {
      counters.protocolErrors += 1;
    },
    incUnknownFlag: () => {
      counters.unknownFlagFrames += 1;
    },
    incUnknownChannel: () => {
      counters.unknownChannelFrames += 1;
    },
    snapshot: () => ({ ...counters })
  };
}
