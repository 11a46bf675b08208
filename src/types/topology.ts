/**
 * NUMA topology type definitions
 */

export interface NumaTopology {
  /** Node id → CPU ids in declared order; ascending node ids, empty nodes kept */
  nodeToCpus: Map<number, number[]>;
  /** CPU id → owning node id */
  cpuToNode: Map<number, number>;
}

export interface TopologySourceOptions {
  /** Static topology text file; takes precedence over the command */
  topologyFile?: string;
  /** Shell command printing `node <id> cpus: ...` lines */
  topologyCommand: string;
}

export interface TopologySource {
  resolve(): Promise<NumaTopology>;
}
