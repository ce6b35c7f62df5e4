import { beforeEach, describe, expect, it } from "vitest";
import { DirectedGraph } from "../src/directed-graph.js";
import { edge } from "../src/edge.js";

describe("DirectedGraph", () => {
  let graph: DirectedGraph;

  beforeEach(() => {
    graph = new DirectedGraph();
  });

  describe("vertices", () => {
    it("adds a vertex once", () => {
      expect(graph.addVertex(14n)).toBe(true);
      expect(graph.addVertex(14n)).toBe(false);
      expect(graph.vertexCount).toBe(1);
      expect(graph.hasVertex(14n)).toBe(true);
    });

    it("iterates in insertion order", () => {
      graph.addVertex(17n);
      graph.addVertex(14n);
      expect([...graph.vertices()]).toEqual([17n, 14n]);
    });

    it("removes incident edges with the vertex", () => {
      graph.addVertex(1n);
      graph.addVertex(2n);
      graph.addEdge(edge(1n, 2n));
      graph.addEdge(edge(2n, 3n));
      graph.addEdge(edge(3n, 4n));

      expect(graph.removeVertex(2n)).toBe(true);

      expect(graph.hasVertex(2n)).toBe(false);
      expect([...graph.edges()]).toEqual([{ from: 3n, to: 4n }]);
    });

    it("reports removal of an absent vertex", () => {
      expect(graph.removeVertex(9n)).toBe(false);
    });

    it("removes edges of an id that is only an endpoint", () => {
      graph.addEdge(edge(14n, 15n));

      expect(graph.removeVertex(15n)).toBe(true);
      expect(graph.edgeCount).toBe(0);
    });
  });

  describe("edges", () => {
    it("does not add endpoints to the vertex set", () => {
      graph.addVertex(14n);
      graph.addEdge(edge(14n, 15n));

      expect(graph.hasEdge(edge(14n, 15n))).toBe(true);
      expect(graph.hasVertex(15n)).toBe(false);
      expect(graph.vertexCount).toBe(1);
    });

    it("treats edges as directed", () => {
      graph.addEdge(edge(1n, 2n));
      expect(graph.hasEdge(edge(2n, 1n))).toBe(false);
    });

    it("adds an edge once", () => {
      expect(graph.addEdge(edge(1n, 2n))).toBe(true);
      expect(graph.addEdge({ from: 1n, to: 2n })).toBe(false);
      expect(graph.edgeCount).toBe(1);
    });

    it("removes an edge", () => {
      graph.addEdge(edge(1n, 2n));
      expect(graph.removeEdge(edge(1n, 2n))).toBe(true);
      expect(graph.removeEdge(edge(1n, 2n))).toBe(false);
      expect(graph.edgeCount).toBe(0);
    });
  });

  describe("equals", () => {
    it("ignores insertion order", () => {
      graph.addVertex(1n);
      graph.addVertex(2n);
      graph.addEdge(edge(1n, 2n));
      graph.addEdge(edge(2n, 1n));

      const other = new DirectedGraph();
      other.addEdge(edge(2n, 1n));
      other.addVertex(2n);
      other.addEdge(edge(1n, 2n));
      other.addVertex(1n);

      expect(graph.equals(other)).toBe(true);
    });

    it("detects a differing edge", () => {
      graph.addEdge(edge(1n, 2n));
      const other = new DirectedGraph();
      other.addEdge(edge(2n, 1n));
      expect(graph.equals(other)).toBe(false);
    });

    it("detects a differing vertex set", () => {
      graph.addVertex(1n);
      expect(graph.equals(new DirectedGraph())).toBe(false);
    });
  });

  describe("clone", () => {
    it("copies without sharing state", () => {
      graph.addVertex(1n);
      graph.addEdge(edge(1n, 2n));

      const copy = graph.clone();
      copy.addVertex(5n);

      expect(copy.hasEdge(edge(1n, 2n))).toBe(true);
      expect(graph.hasVertex(5n)).toBe(false);
    });
  });
});
