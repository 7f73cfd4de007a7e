/** Telnet command bytes that may appear in a Latin-1 input stream. */
export const enum TelnetCodes {
  SE = 240,
  NOP = 241,
  SB = 250,
  WILL = 251,
  WONT = 252,
  DO = 253,
  DONT = 254,
  IAC = 255,
}
