import type { DirectedGraph } from "@histograph/graph";

import { GraphCommand } from "../graph-command.js";

/**
 * Load the graph the snapshot points at.
 */
export class ShowCommand extends GraphCommand<DirectedGraph> {
  async call(): Promise<DirectedGraph> {
    this.checkCallable();
    this.setCallable(false);

    const { graph } = await this.loadSnapshot();
    return graph;
  }
}
