// src/hardware/controlWord.ts
//
// Bit positions are fixed by the driver station protocol.

export const CONTROL_WORD_BITS = {
  enabled: 0,
  autonomous: 1,
  test: 2,
  emergencyStop: 3,
  fmsAttached: 4,
  dsAttached: 5,
} as const;

export type ControlWordFlags = {
  enabled: boolean;
  autonomous: boolean;
  test: boolean;
  emergencyStop: boolean;
  fmsAttached: boolean;
  dsAttached: boolean;
};

const FLAG_NAMES: ReadonlyArray<keyof ControlWordFlags> = [
  "enabled",
  "autonomous",
  "test",
  "emergencyStop",
  "fmsAttached",
  "dsAttached",
];

function bit(word: number, position: number): boolean {
  return ((word >>> position) & 1) !== 0;
}

export function decodeControlWord(word: number): ControlWordFlags {
  return {
    enabled: bit(word, CONTROL_WORD_BITS.enabled),
    autonomous: bit(word, CONTROL_WORD_BITS.autonomous),
    test: bit(word, CONTROL_WORD_BITS.test),
    emergencyStop: bit(word, CONTROL_WORD_BITS.emergencyStop),
    fmsAttached: bit(word, CONTROL_WORD_BITS.fmsAttached),
    dsAttached: bit(word, CONTROL_WORD_BITS.dsAttached),
  };
}

export function encodeControlWord(flags: Partial<ControlWordFlags>): number {
  let word = 0;
  for (const name of FLAG_NAMES) {
    if (flags[name]) word |= 1 << CONTROL_WORD_BITS[name];
  }
  return word;
}

/** Unpacks a button bitmask; bit i is button i. The mask holds 32 bits, so buttons past 31 read as released. */
export function decodeButtons(mask: number, count: number): boolean[] {
  const buttons = new Array<boolean>(count);
  for (let i = 0; i < count; i++) {
    buttons[i] = i < 32 && ((mask >>> i) & 1) !== 0;
  }
  return buttons;
}

export function encodeButtons(buttons: readonly boolean[]): number {
  let mask = 0;
  for (let i = 0; i < buttons.length && i < 32; i++) {
    if (buttons[i]) mask |= 1 << i;
  }
  return mask >>> 0;
}
