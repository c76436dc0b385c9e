/**
 * Shared type definitions for the FeliCa remote reader
 */

/**
 * System code of the transit (cyberne) area family
 */
export const TRANSIT_SYSTEM_CODE = 0x0003;

export const IDM_LENGTH = 8;
export const PMM_LENGTH = 8;
export const BLOCK_SIZE = 16;

/**
 * Card identity captured by Polling. Immutable after capture.
 */
export interface CardIdentity {
  readonly idm: Uint8Array;
  readonly pmm: Uint8Array;
  readonly systemCode: number;
}

/**
 * Opaque capability that exchanges raw frames with a card in the field.
 *
 * Implementations reject with a TransportError: `NoCard` when nothing
 * answers, `IoError` when the card leaves mid-exchange, `Timeout` when the
 * exchange exceeds `timeoutMs`.
 */
export interface CardTransport {
  sendFrame(frame: Uint8Array, timeoutMs: number): Promise<Uint8Array>;
}

/**
 * Address of one block inside the list of services sent at authentication
 */
export interface BlockElement {
  serviceIndex: number;
  blockNumber: number;
}
