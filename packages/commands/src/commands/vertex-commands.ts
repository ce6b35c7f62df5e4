import { type VertexId, vertexId } from "@histograph/graph";

import { MissingArgumentError } from "../errors/index.js";
import { type GraphMutation, UpdateGraphCommand } from "./update-graph-command.js";

abstract class VertexCommand extends UpdateGraphCommand {
  private vertex?: VertexId;

  /**
   * Set the vertex to operate on.
   *
   * @throws InvalidVertexIdError if the value is not an unsigned 64-bit integer
   */
  setVertex(id: number | bigint | string): this {
    this.checkCallable();
    this.vertex = vertexId(id);
    return this;
  }

  protected requireVertex(): VertexId {
    if (this.vertex === undefined) {
      throw new MissingArgumentError("vertex");
    }
    return this.vertex;
  }
}

/**
 * Add a vertex to the snapshot.
 *
 * @example
 * ```typescript
 * const { graphHash } = await repo.addVertex().setVertex(14).call();
 * ```
 */
export class AddVertexCommand extends VertexCommand {
  protected createMutation(): GraphMutation {
    const id = this.requireVertex();
    return (graph) => graph.addVertex(id);
  }
}

/**
 * Remove a vertex and every edge touching it.
 */
export class RemoveVertexCommand extends VertexCommand {
  protected createMutation(): GraphMutation {
    const id = this.requireVertex();
    return (graph) => graph.removeVertex(id);
  }
}
