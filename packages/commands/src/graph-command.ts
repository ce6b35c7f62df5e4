import type { DirectedGraph } from "@histograph/graph";
import {
  type GraphHash,
  ObjectNotFoundError,
  type StorageLocation,
  readGraph,
  readSnapshotPointer,
  saveGraphAs,
} from "@histograph/store-files";

import { NoSnapshotError } from "./errors/index.js";
import type { SnapshotContext } from "./types.js";

/**
 * A snapshot as read from storage.
 */
export interface LoadedSnapshot {
  graphHash: GraphHash;
  graph: DirectedGraph;
}

/**
 * Abstract base class for all graph commands.
 *
 * Implements the Command pattern with single-use semantics.
 * Each command instance can only be called once.
 *
 * @typeParam T - The return type of the command's call() method
 */
export abstract class GraphCommand<T> {
  protected readonly context: SnapshotContext;
  private callable = true;

  constructor(context: SnapshotContext) {
    this.context = context;
  }

  /**
   * Execute the command.
   * Can only be called once per instance.
   */
  abstract call(): Promise<T>;

  protected get location(): StorageLocation {
    return this.context.location;
  }

  protected get snapshotName(): string {
    return this.context.snapshotName;
  }

  /**
   * Verify the command hasn't been called yet.
   * @throws Error if command was already executed
   */
  protected checkCallable(): void {
    if (!this.callable) {
      throw new Error(`Command ${this.constructor.name} has already been called`);
    }
  }

  /**
   * Mark command as no longer callable.
   */
  protected setCallable(value: boolean): void {
    this.callable = value;
  }

  /**
   * Resolve the snapshot name to its root.
   *
   * @throws NoSnapshotError if the snapshot was never saved
   */
  protected async resolveSnapshot(): Promise<GraphHash> {
    try {
      return await readSnapshotPointer(this.location, this.snapshotName);
    } catch (error) {
      if (error instanceof ObjectNotFoundError) {
        throw new NoSnapshotError(this.snapshotName, { cause: error });
      }
      throw error;
    }
  }

  protected async loadSnapshot(): Promise<LoadedSnapshot> {
    const graphHash = await this.resolveSnapshot();
    const graph = await readGraph(this.location, graphHash, this.context.storage);
    return { graphHash, graph };
  }

  protected async saveSnapshot(graph: DirectedGraph): Promise<GraphHash> {
    return saveGraphAs(this.location, this.snapshotName, graph, this.context.storage);
  }
}
