import {
  AddEdgeCommand,
  AddVertexCommand,
  InitCommand,
  RemoveEdgeCommand,
  RemoveVertexCommand,
  ShowCommand,
} from "./commands/index.js";
import { DEFAULT_SNAPSHOT_NAME, type GraphRepositoryConfig, type SnapshotContext } from "./types.js";

/**
 * Main entry point for working with one named graph snapshot.
 *
 * Provides factory methods for all commands. Every command loads the
 * snapshot from storage when called; nothing is cached between commands.
 *
 * @example
 * ```typescript
 * const repo = GraphRepository.open({
 *   files: createNodeFilesApi(),
 *   basePath: "/var/lib/graphs",
 * });
 *
 * await repo.init().call();
 * await repo.addVertex().setVertex(14).call();
 * await repo.addEdge().setFrom(14).setTo(15).call();
 *
 * const graph = await repo.show().call();
 * ```
 */
export class GraphRepository {
  private readonly context: SnapshotContext;

  private constructor(context: SnapshotContext) {
    this.context = context;
  }

  static open(config: GraphRepositoryConfig): GraphRepository {
    const { files, basePath, snapshotName = DEFAULT_SNAPSHOT_NAME, storage = {} } = config;
    return new GraphRepository({ location: { files, basePath }, snapshotName, storage });
  }

  get snapshotName(): string {
    return this.context.snapshotName;
  }

  /**
   * Create a repository over another snapshot in the same store.
   */
  withSnapshot(snapshotName: string): GraphRepository {
    return new GraphRepository({ ...this.context, snapshotName });
  }

  init(): InitCommand {
    return new InitCommand(this.context);
  }

  addVertex(): AddVertexCommand {
    return new AddVertexCommand(this.context);
  }

  addEdge(): AddEdgeCommand {
    return new AddEdgeCommand(this.context);
  }

  removeVertex(): RemoveVertexCommand {
    return new RemoveVertexCommand(this.context);
  }

  removeEdge(): RemoveEdgeCommand {
    return new RemoveEdgeCommand(this.context);
  }

  show(): ShowCommand {
    return new ShowCommand(this.context);
  }
}
