/** Size of the "extradata=3" packet: 66 little-endian float32 fields. */
export const DIRT_RALLY_2_PACKET_SIZE = 264;

const REVERSE_GEAR = 10;
/** The game reports engine speed in tens of rpm. */
const RPM_SCALE = 10;

const FIELD = {
  runTime: 0,
  lapTime: 1,
  distance: 2,
  progress: 3,
  speed: 7,
  throttle: 29,
  steering: 30,
  brake: 31,
  clutch: 32,
  gear: 33,
  currentLap: 36,
  rpm: 37,
  maxRpm: 63,
  idleRpm: 64,
  maxGears: 65
} as const;

export interface DirtRally2Packet {
  runTime: number;
  lapTime: number;
  distance: number;
  progress: number;
  /** m/s */
  speed: number;
  throttle: number;
  steering: number;
  brake: number;
  clutch: number;
  /** -1 reverse, 0 neutral */
  gear: number;
  currentLap: number;
  rpm: number;
  maxRpm: number;
  idleRpm: number;
  maxGears: number;
}

function readField(buf: Buffer, index: number): number {
  return buf.readFloatLE(index * 4);
}

function decodeGear(raw: number): number {
  const gear = Math.round(raw);
  return gear === REVERSE_GEAR ? -1 : gear;
}

/** Returns `undefined` for packets that are too short to be telemetry. */
export function decodePacket(buf: Buffer): DirtRally2Packet | undefined {
  if (buf.length < DIRT_RALLY_2_PACKET_SIZE) return undefined;

  return {
    runTime: readField(buf, FIELD.runTime),
    lapTime: readField(buf, FIELD.lapTime),
    distance: readField(buf, FIELD.distance),
    progress: readField(buf, FIELD.progress),
    speed: readField(buf, FIELD.speed),
    throttle: readField(buf, FIELD.throttle),
    steering: readField(buf, FIELD.steering),
    brake: readField(buf, FIELD.brake),
    clutch: readField(buf, FIELD.clutch),
    gear: decodeGear(readField(buf, FIELD.gear)),
    currentLap: readField(buf, FIELD.currentLap),
    rpm: readField(buf, FIELD.rpm) * RPM_SCALE,
    maxRpm: readField(buf, FIELD.maxRpm) * RPM_SCALE,
    idleRpm: readField(buf, FIELD.idleRpm) * RPM_SCALE,
    maxGears: readField(buf, FIELD.maxGears)
  };
}
