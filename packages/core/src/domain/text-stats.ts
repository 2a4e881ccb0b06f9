export interface TextStats {
  workId: number;
  lemmaCoveragePct?: number;
  tokensSeen: number;
  uniqueLemmasKnown: number;
  avgWpm?: number;
  comprehensionPct?: number;
  segmentsCompleted: number;
  lastSegmentRef?: string;
  maxHintlessRun: number;
}
