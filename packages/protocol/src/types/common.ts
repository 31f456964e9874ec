// Common types used across the protocol

/**
 * Storage-generated row identifier (positive integer)
 */
export type Id = number;

/**
 * Calendar date string, YYYY-MM-DD
 */
export type DateString = string;

/**
 * Wall-clock time string, HH:MM:SS (HH:MM is accepted on input)
 */
export type TimeString = string;
