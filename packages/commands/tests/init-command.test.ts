/**
 * Tests for InitCommand
 */

import { graphHashEquals, loadGraph } from "@histograph/store-files";
import { describe, expect, it } from "vitest";

import { InitCommand, SnapshotAlreadyExistsError } from "../src/index.js";
import { BASE_PATH, createTestRepository } from "./test-helper.js";

describe("InitCommand", () => {
  it("should save an empty graph under the default snapshot name", async () => {
    const { files, repo } = createTestRepository();

    const command = repo.init();
    expect(command).toBeInstanceOf(InitCommand);
    await command.call();

    expect(repo.snapshotName).toBe("current");
    const graph = await loadGraph({ files, basePath: BASE_PATH }, "current");
    expect(graph.vertexCount).toBe(0);
    expect(graph.edgeCount).toBe(0);
    expect(await files.exists(`${BASE_PATH}/graph/current`)).toBe(true);
  });

  it("should use the configured snapshot name", async () => {
    const { files, repo } = createTestRepository("work");

    await repo.init().call();

    expect(await files.exists(`${BASE_PATH}/graph/work`)).toBe(true);
    expect(await files.exists(`${BASE_PATH}/graph/current`)).toBe(false);
  });

  it("should refuse to replace an existing snapshot", async () => {
    const { repo } = createTestRepository();
    await repo.init().call();

    await expect(repo.init().call()).rejects.toBeInstanceOf(SnapshotAlreadyExistsError);
  });

  it("should replace an existing snapshot when forced", async () => {
    const { repo } = createTestRepository();
    const empty = await repo.init().call();
    await repo.addVertex().setVertex(1).call();

    const reset = await repo.init().setForce(true).call();

    expect(graphHashEquals(reset, empty)).toBe(true);
    expect((await repo.show().call()).vertexCount).toBe(0);
  });

  it("should not be callable twice", async () => {
    const { repo } = createTestRepository();
    const command = repo.init();
    await command.call();

    await expect(command.call()).rejects.toThrow("already been called");
    expect(() => command.setForce(true)).toThrow("already been called");
  });
});
