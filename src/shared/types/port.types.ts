export interface SerialPortInfo {
  /** OS device path (e.g. /dev/ttyUSB0, COM3) */
  path: string;
  description: string;
}
