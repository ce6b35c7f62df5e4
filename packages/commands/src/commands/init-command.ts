import { DirectedGraph } from "@histograph/graph";
import { type GraphHash, hasSnapshot } from "@histograph/store-files";

import { SnapshotAlreadyExistsError } from "../errors/index.js";
import { GraphCommand } from "../graph-command.js";

/**
 * Point the snapshot at an empty graph.
 *
 * @example
 * ```typescript
 * await repo.init().call();
 *
 * // Start over, discarding the current contents
 * await repo.init().setForce(true).call();
 * ```
 */
export class InitCommand extends GraphCommand<GraphHash> {
  private force = false;

  /**
   * Replace an existing snapshot instead of failing.
   */
  setForce(force: boolean): this {
    this.checkCallable();
    this.force = force;
    return this;
  }

  async call(): Promise<GraphHash> {
    this.checkCallable();
    this.setCallable(false);

    if (!this.force && (await hasSnapshot(this.location, this.snapshotName))) {
      throw new SnapshotAlreadyExistsError(this.snapshotName);
    }
    return this.saveSnapshot(new DirectedGraph());
  }
}
