export interface ProbeResult {
  status: number;
  body: string;
  finalUrl: string;
  elapsedMs: number;
}
