import { type Edge, type VertexId, edge, vertexId } from "@histograph/graph";

import { MissingArgumentError } from "../errors/index.js";
import { type GraphMutation, UpdateGraphCommand } from "./update-graph-command.js";

abstract class EdgeCommand extends UpdateGraphCommand {
  private from?: VertexId;
  private to?: VertexId;

  /**
   * Set the source vertex.
   */
  setFrom(id: number | bigint | string): this {
    this.checkCallable();
    this.from = vertexId(id);
    return this;
  }

  /**
   * Set the target vertex.
   */
  setTo(id: number | bigint | string): this {
    this.checkCallable();
    this.to = vertexId(id);
    return this;
  }

  protected requireEdge(): Edge {
    if (this.from === undefined) {
      throw new MissingArgumentError("from");
    }
    if (this.to === undefined) {
      throw new MissingArgumentError("to");
    }
    return edge(this.from, this.to);
  }
}

/**
 * Add a directed edge to the snapshot.
 *
 * The endpoints are not added to the vertex set.
 *
 * @example
 * ```typescript
 * await repo.addEdge().setFrom(14).setTo(15).call();
 * ```
 */
export class AddEdgeCommand extends EdgeCommand {
  protected createMutation(): GraphMutation {
    const e = this.requireEdge();
    return (graph) => graph.addEdge(e);
  }
}

/**
 * Remove a directed edge from the snapshot.
 */
export class RemoveEdgeCommand extends EdgeCommand {
  protected createMutation(): GraphMutation {
    const e = this.requireEdge();
    return (graph) => graph.removeEdge(e);
  }
}
