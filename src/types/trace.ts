// Trace types: per-cycle vectors, segments and scenarios

// Signal name -> bit string (MSB first) for one clock cycle
export type CycleVector = Record<string, string>;

// A contiguous run of cycles sharing one declared cycle count.
// Every array in `signals` must hold exactly `clockCycles` entries.
export interface Segment {
  clockCycles: number;
  signals: Record<string, string[]>;
}

export interface Scenario {
  name: string;
  inputs: Segment[];
  // Absent when the trace only carries stimulus
  outputs?: Segment[];
}
