/**
 * FeliCa frame codec
 *
 * Frames are `LEN | CODE | DATA...` where LEN counts every byte including
 * itself. Responses echo the command code plus one and, for most commands,
 * the 8-byte IDm. No checksum travels at this layer; the RF front end
 * handles CRC.
 */

import { CardStatusError, MalformedFrameError } from "../errors.js";
import {
  BLOCK_SIZE,
  IDM_LENGTH,
  PMM_LENGTH,
  type BlockElement,
  type CardIdentity,
} from "../types/index.js";

export const MAX_FRAME_LENGTH = 0xff;
export const MAX_BLOCKS_PER_REQUEST = 12;

export const CommandCode = {
  Polling: 0x00,
  ReadWithoutEncryption: 0x06,
  Authentication1: 0x10,
  Authentication2: 0x12,
  AuthenticatedRead: 0x14,
} as const;

export type CommandCode = (typeof CommandCode)[keyof typeof CommandCode];

/**
 * Response codes whose payload starts with IDm followed by SF1 SF2
 */
const STATUS_FLAG_RESPONSES: ReadonlySet<number> = new Set([
  CommandCode.ReadWithoutEncryption + 1,
  CommandCode.AuthenticatedRead + 1,
]);

export interface StatusFlags {
  flag1: number;
  flag2: number;
}

export interface FelicaResponse {
  code: number;
  /** IDm echoed by the card; null unless decoded with `hasIdm` */
  idm: Uint8Array | null;
  statusFlags: StatusFlags | null;
  /** Bytes after the code (and after IDm/status flags when present) */
  payload: Uint8Array;
}

export interface DecodeOptions {
  /** Reject the frame unless its response code matches */
  expectedCode?: number;
  /** Split the 8-byte IDm (and, for read/write responses, SF1 SF2) off the payload */
  hasIdm?: boolean;
}

function assertByte(value: number, label: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new MalformedFrameError(`${label} out of range: ${value}`);
  }
}

export function encodeCommand(opcode: number, payload: Uint8Array): Uint8Array {
  assertByte(opcode, "Opcode");
  const length = payload.length + 2;
  if (length > MAX_FRAME_LENGTH) {
    throw new MalformedFrameError(
      `Frame too long: ${length} bytes (max ${MAX_FRAME_LENGTH})`,
    );
  }
  const frame = new Uint8Array(length);
  frame[0] = length;
  frame[1] = opcode;
  frame.set(payload, 2);
  return frame;
}

/**
 * Split a frame into code, IDm, status flags and payload.
 *
 * The declared length must equal the byte count. Without `hasIdm` the payload
 * is every byte after the code, so `decodeResponse(encodeCommand(op, p))`
 * gives back `p`.
 */
export function decodeResponse(
  bytes: Uint8Array,
  options: DecodeOptions = {},
): FelicaResponse {
  if (bytes.length < 2) {
    throw new MalformedFrameError(`Frame too short: ${bytes.length} bytes`);
  }
  const declared = bytes[0];
  if (declared !== bytes.length) {
    throw new MalformedFrameError(
      `Declared length ${declared} does not match ${bytes.length} received bytes`,
    );
  }
  const code = bytes[1];
  if (options.expectedCode !== undefined && code !== options.expectedCode) {
    throw new MalformedFrameError(
      `Unexpected response code 0x${code.toString(16).padStart(2, "0")}, expected 0x${options.expectedCode.toString(16).padStart(2, "0")}`,
    );
  }

  const body = bytes.subarray(2);
  if (!options.hasIdm) {
    return { code, idm: null, statusFlags: null, payload: body.slice() };
  }
  if (body.length < IDM_LENGTH) {
    throw new MalformedFrameError(`Frame missing IDm: ${body.length} bytes after code`);
  }

  const idm = body.slice(0, IDM_LENGTH);
  const rest = body.subarray(IDM_LENGTH);
  if (!STATUS_FLAG_RESPONSES.has(code)) {
    return { code, idm, statusFlags: null, payload: rest.slice() };
  }
  if (rest.length < 2) {
    throw new MalformedFrameError("Frame missing status flags");
  }
  return {
    code,
    idm,
    statusFlags: { flag1: rest[0], flag2: rest[1] },
    payload: rest.slice(2),
  };
}

/**
 * Polling with request code 0x01 (system code request), single time slot
 */
export function encodePolling(systemCode: number): Uint8Array {
  return encodeCommand(
    CommandCode.Polling,
    Uint8Array.of((systemCode >> 8) & 0xff, systemCode & 0xff, 0x01, 0x00),
  );
}

/**
 * Decode a Polling response into the card identity.
 * The response must carry IDm, PMm and, when requested, the system code.
 */
export function decodePolling(bytes: Uint8Array): CardIdentity {
  const response = decodeResponse(bytes, {
    expectedCode: CommandCode.Polling + 1,
    hasIdm: true,
  });
  const { idm, payload } = response;
  if (idm === null || payload.length < PMM_LENGTH) {
    throw new MalformedFrameError("Polling response missing PMm");
  }
  const pmm = payload.slice(0, PMM_LENGTH);
  const requestData = payload.subarray(PMM_LENGTH);
  if (requestData.length !== 0 && requestData.length !== 2) {
    throw new MalformedFrameError(
      `Polling response has ${requestData.length} bytes of request data`,
    );
  }
  const systemCode =
    requestData.length === 2 ? (requestData[0] << 8) | requestData[1] : -1;
  return Object.freeze({ idm, pmm, systemCode });
}

/**
 * `N | (0x80 | serviceIndex, blockNumber) * N`, the payload of an
 * authenticated read
 */
export function encodeBlockList(elements: readonly BlockElement[]): Uint8Array {
  if (elements.length === 0 || elements.length > MAX_BLOCKS_PER_REQUEST) {
    throw new MalformedFrameError(
      `Block list must hold 1 to ${MAX_BLOCKS_PER_REQUEST} elements, got ${elements.length}`,
    );
  }
  const out = new Uint8Array(1 + elements.length * 2);
  out[0] = elements.length;
  elements.forEach(({ serviceIndex, blockNumber }, i) => {
    if (!Number.isInteger(serviceIndex) || serviceIndex < 0 || serviceIndex > 15) {
      throw new MalformedFrameError(`Service index out of range: ${serviceIndex}`);
    }
    assertByte(blockNumber, "Block number");
    out[1 + i * 2] = 0x80 | serviceIndex;
    out[2 + i * 2] = blockNumber;
  });
  return out;
}

/**
 * Decode the plaintext of an authenticated read: `SF1 | SF2 | N | N * 16`.
 *
 * Non-zero SF1 means the card refused the read and raises CardStatusError;
 * such a response may stop after SF2.
 * Trailing bytes past the expected blocks are ignored.
 */
export function decodeReadResponse(
  bytes: Uint8Array,
  expectedBlocks: number,
): Uint8Array[] {
  if (bytes.length < 2) {
    throw new MalformedFrameError(`Read response too short: ${bytes.length} bytes`);
  }
  const [flag1, flag2] = bytes;
  if (flag1 !== 0x00) {
    throw new CardStatusError(flag1, flag2);
  }
  if (bytes.length < 3) {
    throw new MalformedFrameError("Read response has no block count");
  }
  const count = bytes[2];
  if (count !== expectedBlocks) {
    throw new MalformedFrameError(
      `Read response holds ${count} blocks, expected ${expectedBlocks}`,
    );
  }
  const data = bytes.subarray(3);
  const expectedLength = expectedBlocks * BLOCK_SIZE;
  if (data.length < expectedLength) {
    throw new MalformedFrameError(
      `Read response data is ${data.length} bytes, expected ${expectedLength}`,
    );
  }
  const blocks: Uint8Array[] = [];
  for (let i = 0; i < expectedBlocks; i++) {
    blocks.push(data.slice(i * BLOCK_SIZE, (i + 1) * BLOCK_SIZE));
  }
  return blocks;
}
