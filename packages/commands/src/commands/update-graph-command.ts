import type { DirectedGraph } from "@histograph/graph";

import { GraphCommand } from "../graph-command.js";
import type { GraphUpdateResult } from "../results/index.js";

/**
 * Change to apply to a loaded graph. Returns false when the graph is
 * left as it was.
 */
export type GraphMutation = (graph: DirectedGraph) => boolean;

/**
 * Base for commands that load the snapshot, change the graph and save it
 * back under the same name.
 *
 * Arguments are checked before anything is read. When the change leaves
 * the graph as it was, nothing is written.
 */
export abstract class UpdateGraphCommand extends GraphCommand<GraphUpdateResult> {
  async call(): Promise<GraphUpdateResult> {
    this.checkCallable();
    this.setCallable(false);

    const mutate = this.createMutation();
    const { graphHash, graph } = await this.loadSnapshot();
    if (!mutate(graph)) {
      return { graphHash, changed: false };
    }
    return { graphHash: await this.saveSnapshot(graph), changed: true };
  }

  /**
   * Validate the arguments and build the change.
   *
   * @throws MissingArgumentError if a required argument was not set
   */
  protected abstract createMutation(): GraphMutation;
}
