/**
 * Tests for AddEdgeCommand and RemoveEdgeCommand
 */

import { edge } from "@histograph/graph";
import { describe, expect, it } from "vitest";

import { MissingArgumentError, NoSnapshotError } from "../src/index.js";
import { createInitializedRepository, createTestRepository } from "./test-helper.js";

describe("AddEdgeCommand", () => {
  it("should add the edge without adding its endpoints as vertices", async () => {
    const repo = await createInitializedRepository();
    await repo.addVertex().setVertex(14).call();

    const result = await repo.addEdge().setFrom(14).setTo(15).call();

    expect(result.changed).toBe(true);
    const graph = await repo.show().call();
    expect(graph.hasEdge(edge(14n, 15n))).toBe(true);
    expect(graph.hasVertex(15n)).toBe(false);
  });

  it("should keep direction", async () => {
    const repo = await createInitializedRepository();

    await repo.addEdge().setFrom(1).setTo(2).call();

    const graph = await repo.show().call();
    expect(graph.hasEdge(edge(1n, 2n))).toBe(true);
    expect(graph.hasEdge(edge(2n, 1n))).toBe(false);
  });

  it("should report no change for an existing edge", async () => {
    const repo = await createInitializedRepository();
    await repo.addEdge().setFrom(1).setTo(2).call();

    const result = await repo.addEdge().setFrom(1).setTo(2).call();

    expect(result.changed).toBe(false);
  });

  it("should require both endpoints", async () => {
    const repo = await createInitializedRepository();

    await expect(repo.addEdge().setTo(2).call()).rejects.toThrow(
      "Missing required argument: from",
    );
    await expect(repo.addEdge().setFrom(1).call()).rejects.toBeInstanceOf(MissingArgumentError);
  });

  it("should fail when the snapshot was never initialised", async () => {
    const { repo } = createTestRepository();

    await expect(repo.addEdge().setFrom(1).setTo(2).call()).rejects.toBeInstanceOf(
      NoSnapshotError,
    );
  });
});

describe("RemoveEdgeCommand", () => {
  it("should remove the edge and keep its endpoints", async () => {
    const repo = await createInitializedRepository();
    await repo.addVertex().setVertex(1).call();
    await repo.addVertex().setVertex(2).call();
    await repo.addEdge().setFrom(1).setTo(2).call();

    const result = await repo.removeEdge().setFrom(1).setTo(2).call();

    expect(result.changed).toBe(true);
    const graph = await repo.show().call();
    expect(graph.edgeCount).toBe(0);
    expect(graph.vertexCount).toBe(2);
  });

  it("should report no change for a missing edge", async () => {
    const repo = await createInitializedRepository();

    const result = await repo.removeEdge().setFrom(1).setTo(2).call();

    expect(result.changed).toBe(false);
  });
});
