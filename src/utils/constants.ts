// src/utils/constants.ts

// Cells shown on each side of the head when a tape is printed
export const PRINT_PADDING = 15;

// Delay between steps when sleeping is enabled (in ms)
export const SLEEP_DELAY_MS = 100;

// Overrides SLEEP_DELAY_MS when set to a non-negative integer
export const SLEEP_DELAY_ENV = 'TM_SLEEP_MS';

export const NUMBER_OF_TAPES = 3;

// The product is read off the third tape.
export const RESULT_TAPE_INDEX = 2;
