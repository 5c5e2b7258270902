import { describe, it, expect } from "vitest";
import * as path from "path";
import { loadConnections, parseConnections } from "../connections/ConnectionList";
import { ConnectionListError } from "../errors";

describe("Connection list", () => {
    it("loads the compact YAML form", () => {
        const connections = loadConnections(path.join(__dirname, "assets", "connections.yml"));
        expect(connections).toEqual([
            {
                name: "ch1",
                from: { refdes: "A", connector: "out1" },
                to: { refdes: "B", connector: "in1" },
                groupKey: "snake-1",
                display: {
                    labelAtA: "MIC 1",
                    labelAtB: "IN 1",
                    centerLabel: "Kick",
                    style: { baseColor: "#d62728", outlineColor: "black" },
                },
            },
            {
                name: "ch2",
                from: { refdes: "A", connector: "out2" },
                to: { refdes: "B", connector: "2" },
                display: {
                    labelAtA: "",
                    labelAtB: "",
                    centerLabel: "ch2",
                    style: { baseColor: "blue", outlineColor: "black" },
                },
            },
        ]);
    });

    it("accepts channel-map instance records", () => {
        const [c] = parseConnections([
            {
                instance_name: "ch-3",
                parent_instance: "snake-2",
                this_net_from_device_refdes: "X1",
                this_net_from_device_connector_name: 3,
                this_net_to_device_refdes: "PREAMP1",
                this_net_to_device_connector_name: "in3",
                print_name_at_end_a: "3",
                print_name_at_end_b: "IN3",
                print_name: "Snare",
                appearance: { base_color: "green", outline_color: "white" },
            },
        ]);
        expect(c).toEqual({
            name: "ch-3",
            from: { refdes: "X1", connector: "3" },
            to: { refdes: "PREAMP1", connector: "in3" },
            groupKey: "snake-2",
            display: {
                labelAtA: "3",
                labelAtB: "IN3",
                centerLabel: "Snare",
                style: { baseColor: "green", outlineColor: "white" },
            },
        });
    });

    it("names the entry and field that are wrong", () => {
        expect(() => parseConnections({ connections: [{ name: "a", from: { refdes: "A" }, to: { refdes: "B", connector: "1" } }] })).toThrow(
            'connections entry #0.from: field "connector" must be a non-empty string'
        );
        expect(() => parseConnections([{ name: "a", from: "A.1" }])).toThrow('connections entry #0: field "from" must be a mapping');
        expect(() => parseConnections([42])).toThrow("connections entry #0: expected a mapping");
    });

    it("rejects duplicate names", () => {
        const entry = { name: "dup", from: { refdes: "A", connector: "1" }, to: { refdes: "B", connector: "1" } };
        expect(() => parseConnections([entry, entry])).toThrow('connections entry #1: duplicate connection name "dup"');
    });

    it("rejects documents that are not lists", () => {
        expect(() => parseConnections("nope", "list.yml")).toThrow(ConnectionListError);
        expect(() => parseConnections({ other: [] }, "list.yml")).toThrow(
            "list.yml: expected a list of connections or a `connections:` key"
        );
    });

    it("reports a missing file", () => {
        expect(() => loadConnections(path.join(__dirname, "assets", "missing.yml"))).toThrow("connection list not found");
    });
});
