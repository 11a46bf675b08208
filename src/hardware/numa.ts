/**
 * NUMA topology discovery from `numactl --hardware` output or a static file
 */

import * as fs from 'fs/promises';
import { NumaTopology, TopologySource, TopologySourceOptions } from '../types/topology.js';
import { executeCommand, commandExists } from '../utils/exec.js';
import { TopologyError, ErrorCode, errnoCode, toError } from '../errors/index.js';
import type { Logger } from '../logger/index.js';

const NODE_CPUS_LINE = /^node\s+(\d+)\s+cpus:(.*)$/;

/**
 * Parse `node <id> cpus: <id> <id> ...` lines.
 * A node listing no CPUs is kept with an empty list so it still gets a column.
 */
export function parseNumaTopology(text: string): NumaTopology {
  const declared = new Map<number, number[]>();

  for (const line of text.split('\n')) {
    const match = line.trim().match(NODE_CPUS_LINE);
    if (!match) continue;

    const nodeId = parseInt(match[1] ?? '', 10);
    const cpus = (match[2] ?? '')
      .trim()
      .split(/\s+/)
      .filter(c => c !== '')
      .map(c => parseInt(c, 10))
      .filter(c => !isNaN(c));

    declared.set(nodeId, cpus);
  }

  if (declared.size === 0) {
    throw new TopologyError('No NUMA nodes found in topology output', ErrorCode.TOPOLOGY_PARSE_ERROR);
  }

  const nodeToCpus = new Map<number, number[]>(
    [...declared.entries()].sort(([a], [b]) => a - b)
  );
  const cpuToNode = new Map<number, number>();
  for (const [node, cpus] of nodeToCpus) {
    for (const cpu of cpus) {
      cpuToNode.set(cpu, node);
    }
  }

  return { nodeToCpus, cpuToNode };
}

/**
 * CPUs that the topology does not map to any node
 */
export function findUnmappedCpus(cpus: readonly number[], topology: NumaTopology): number[] {
  return cpus.filter(cpu => !topology.cpuToNode.has(cpu));
}

export class TopologyResolver implements TopologySource {
  private readonly options: TopologySourceOptions;
  private readonly logger?: Logger;

  constructor(options: TopologySourceOptions, logger?: Logger) {
    this.options = options;
    this.logger = logger;
  }

  /**
   * Build the CPU ↔ node mapping. Every failure is fatal.
   */
  async resolve(): Promise<NumaTopology> {
    const text = this.options.topologyFile
      ? await this.readTopologyFile(this.options.topologyFile)
      : await this.runTopologyCommand(this.options.topologyCommand);

    const topology = parseNumaTopology(text);
    this.logger?.debug('Resolved NUMA topology', {
      nodes: topology.nodeToCpus.size,
      cpus: topology.cpuToNode.size,
    });
    return topology;
  }

  private async readTopologyFile(path: string): Promise<string> {
    try {
      return await fs.readFile(path, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        throw new TopologyError(
          `topology file not found: ${path}`,
          ErrorCode.TOPOLOGY_FILE_NOT_FOUND,
          { path },
          toError(error)
        );
      }
      throw new TopologyError(
        `cannot read topology file ${path}: ${toError(error).message}`,
        ErrorCode.TOPOLOGY_FILE_UNREADABLE,
        { path },
        toError(error)
      );
    }
  }

  private async runTopologyCommand(command: string): Promise<string> {
    const tool = command.trim().split(/\s+/)[0] ?? command;
    if (!(await commandExists(tool))) {
      throw new TopologyError(
        `${tool} is not installed; install it or pass a topology file`,
        ErrorCode.TOPOLOGY_TOOL_NOT_INSTALLED,
        { command }
      );
    }

    const result = await executeCommand(command);
    if (result.exitCode !== 0) {
      throw new TopologyError(
        `${command} failed (exit ${result.exitCode}): ${result.stderr}`,
        ErrorCode.TOPOLOGY_COMMAND_FAILED,
        { command, exitCode: result.exitCode }
      );
    }
    return result.stdout;
  }
}
