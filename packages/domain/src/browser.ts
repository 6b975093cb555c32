/**
 * Browser fingerprint captured at checkout, used for strong customer
 * authentication (3DS) by connectors that ask for it.
 */
export interface BrowserInformation {
  colorDepth: number;
  javaEnabled: boolean;
  javaScriptEnabled: boolean;
  language: string;
  screenHeight: number;
  screenWidth: number;
  /** Minutes offset from UTC */
  timeZone: number;
  ipAddress?: string;
  acceptHeader: string;
  userAgent: string;
}
