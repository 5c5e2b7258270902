import { describe, it, expect } from "vitest";
import { buildGraph } from "../graph/ConnectivityGraph";
import { pathNodes, resolveConnections, resolvePath } from "../graph/PathResolver";
import { ConnectionError } from "../errors";
import { connection, pinsOf, wire } from "./helpers";

const pins = pinsOf({ "P.1": { x: 0, y: 0 }, "Q.1": { x: 2, y: 0 }, "Z.1": { x: 9, y: 9 } });

describe("Path resolver", () => {
    it("prefers the route with fewer segments over the one defined first", () => {
        const { graph } = buildGraph(pins, [
            wire("l1", 0, 0, 0, 1),
            wire("l2", 0, 1, 1, 1),
            wire("l3", 1, 1, 2, 1),
            wire("l4", 2, 1, 2, 0),
            wire("s1", 0, 0, 1, 0),
            wire("s2", 1, 0, 2, 0),
        ]);
        expect(resolvePath(graph, "P.1", "Q.1")).toEqual([
            { segment: "s1", direction: "a_to_b" },
            { segment: "s2", direction: "a_to_b" },
        ]);
    });

    it("breaks ties between equally short routes by segment uuid", () => {
        const { graph } = buildGraph(pins, [
            wire("b1", 0, 0, 1, -1),
            wire("b2", 1, -1, 2, 0),
            wire("a1", 0, 0, 1, 1),
            wire("a2", 1, 1, 2, 0),
        ]);
        const steps = resolvePath(graph, "P.1", "Q.1");
        expect(steps.map((s) => s.segment)).toEqual(["a1", "a2"]);
        expect(pathNodes(graph, "P.1", steps)).toEqual(["P.1", "wirejunction-1", "Q.1"]);
    });

    it("records travel against the wire direction", () => {
        const { graph } = buildGraph(pins, [wire("r", 2, 0, 0, 0)]);
        expect(resolvePath(graph, "P.1", "Q.1")).toEqual([{ segment: "r", direction: "b_to_a" }]);
        expect(resolvePath(graph, "Q.1", "P.1")).toEqual([{ segment: "r", direction: "a_to_b" }]);
    });

    it("returns an empty path when both ends are the same node", () => {
        const { graph } = buildGraph(pins, []);
        expect(resolvePath(graph, "P.1", "P.1")).toEqual([]);
    });

    it("follows pin aliases", () => {
        const { graph } = buildGraph(pinsOf({ "P.1": { x: 0, y: 0 }, "P.2": { x: 0, y: 0 }, "Q.1": { x: 2, y: 0 } }), [
            wire("w", 0, 0, 2, 0),
        ]);
        expect(resolvePath(graph, "P.2", "Q.1")).toEqual([{ segment: "w", direction: "a_to_b" }]);
    });

    it("fails with NO_PATH between disconnected nodes", () => {
        const { graph } = buildGraph(pins, [wire("w", 0, 0, 2, 0)]);
        expect(() => resolvePath(graph, "P.1", "Z.1", "ch1")).toThrow("NO_PATH: ch1: no path found: P.1 → Z.1");
    });

    it("fails with MISSING_ENDPOINT for unknown nodes", () => {
        const { graph } = buildGraph(pins, []);
        expect(() => resolvePath(graph, "X.9", "P.1", "ch1")).toThrow(
            "MISSING_ENDPOINT: ch1: from node 'X.9' not found in graph"
        );
        expect(() => resolvePath(graph, "P.1", "X.9", "ch1")).toThrow(
            "MISSING_ENDPOINT: ch1: to node 'X.9' not found in graph"
        );
    });

    it("resolves each connection independently", () => {
        const { graph } = buildGraph(pins, [wire("w", 0, 0, 2, 0)]);
        const { routed, errors } = resolveConnections(graph, [
            connection("ok", "P.1", "Q.1"),
            connection("lost", "P.1", "Z.1"),
            connection("typo", "P.7", "Q.1"),
        ]);

        expect(routed.map((r) => r.path)).toEqual([
            { connectionName: "ok", fromNode: "P.1", toNode: "Q.1", steps: [{ segment: "w", direction: "a_to_b" }] },
        ]);
        expect(errors.map((e) => [e.code, e.connectionName])).toEqual([
            ["NO_PATH", "lost"],
            ["MISSING_ENDPOINT", "typo"],
        ]);
        expect(errors.every((e) => e instanceof ConnectionError)).toBe(true);
    });
});
