export const REPORT_TITLE = "Daily Pivot Levels (Ticker + Peers)";
export const REPORT_SUBTITLE =
  "P=(H+L+C)/3; S1=2P−H; S2=P−(H−L); R1=2P−L; R2=P+(H−L)";
export const NOTIFICATION_TITLE = "Daily Pivot Levels";

export const PDF_FILE = "report.pdf";
export const CSV_FILE = "table.csv";
export const HTML_FILE = "index.html";

export const OUTPUT_FILES = [PDF_FILE, HTML_FILE, CSV_FILE] as const;
