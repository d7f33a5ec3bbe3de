export type SimulationMetrics = {
  completed: number;
  /** Sum of (completion tick - arrival tick) over completed processes. */
  totalTurnaround: number;
};

export type TerminationReason = "drained" | "tick-limit";

export type SimulationSummary = {
  completed: number;
  totalTurnaround: number;
  averageTurnaround: number | null;
  endTime: number;
  terminationReason?: TerminationReason;
};
