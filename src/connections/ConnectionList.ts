import * as fs from "fs";
import * as yaml from "js-yaml";
import { ConnectionListError } from "../errors";
import { ConnectionEnd, DEFAULT_STYLE, RequestedConnection } from "./types";

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Loads requested connections from a YAML or JSON file (js-yaml reads both).
 *
 * Accepted shapes:
 * - `{ connections: [...] }` or a bare list
 * - entries either in the compact form
 *   `{ name, from: { refdes, connector }, to: {...}, group?, labels?, appearance? }`
 * - or as flat channel-map instance records
 *   (`instance_name`, `this_net_from_device_refdes`, ...)
 */
export function loadConnections(filePath: string): RequestedConnection[] {
  if (!fs.existsSync(filePath)) {
    throw new ConnectionListError(filePath, "connection list not found");
  }

  let doc: unknown;
  try {
    doc = yaml.load(fs.readFileSync(filePath, "utf-8"));
  } catch (e) {
    throw new ConnectionListError(filePath, `could not be parsed: ${e instanceof Error ? e.message : String(e)}`);
  }

  return parseConnections(doc, filePath);
}

export function parseConnections(doc: unknown, source = "connections"): RequestedConnection[] {
  const list = Array.isArray(doc) ? doc : isRecord(doc) ? doc.connections : undefined;
  if (!Array.isArray(list)) {
    throw new ConnectionListError(source, "expected a list of connections or a `connections:` key");
  }

  const seen = new Set<string>();
  return list.map((entry, index) => {
    const where = `${source} entry #${index}`;
    if (!isRecord(entry)) {
      throw new ConnectionListError(where, "expected a mapping");
    }
    const connection = "instance_name" in entry ? fromInstanceRecord(entry, where) : fromCompact(entry, where);
    if (seen.has(connection.name)) {
      throw new ConnectionListError(where, `duplicate connection name "${connection.name}"`);
    }
    seen.add(connection.name);
    return connection;
  });
}

function requireString(obj: Json, key: string, where: string): string {
  const value = obj[key];
  if (typeof value === "number") return String(value);
  if (typeof value !== "string" || value.length === 0) {
    throw new ConnectionListError(where, `field "${key}" must be a non-empty string`);
  }
  return value;
}

function optionalString(obj: Json, key: string, where: string): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "number") return String(value);
  if (typeof value !== "string") {
    throw new ConnectionListError(where, `field "${key}" must be a string`);
  }
  return value;
}

function requireRecord(obj: Json, key: string, where: string): Json {
  const value = obj[key];
  if (!isRecord(value)) {
    throw new ConnectionListError(where, `field "${key}" must be a mapping`);
  }
  return value;
}

function optionalRecord(obj: Json, key: string, where: string): Json {
  const value = obj[key];
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ConnectionListError(where, `field "${key}" must be a mapping`);
  }
  return value;
}

function readEnd(obj: Json, key: string, where: string): ConnectionEnd {
  const end = requireRecord(obj, key, where);
  return {
    refdes: requireString(end, "refdes", `${where}.${key}`),
    connector: requireString(end, "connector", `${where}.${key}`),
  };
}

function readStyle(appearance: Json, where: string) {
  return {
    baseColor: optionalString(appearance, "base_color", where) ?? DEFAULT_STYLE.baseColor,
    outlineColor: optionalString(appearance, "outline_color", where) ?? DEFAULT_STYLE.outlineColor,
  };
}

function fromCompact(entry: Json, where: string): RequestedConnection {
  const name = requireString(entry, "name", where);
  const labels = optionalRecord(entry, "labels", where);
  const group = optionalString(entry, "group", where);

  return {
    name,
    from: readEnd(entry, "from", where),
    to: readEnd(entry, "to", where),
    ...(group !== undefined ? { groupKey: group } : {}),
    display: {
      labelAtA: optionalString(labels, "a", where) ?? "",
      labelAtB: optionalString(labels, "b", where) ?? "",
      centerLabel: optionalString(labels, "center", where) ?? name,
      style: readStyle(optionalRecord(entry, "appearance", where), where),
    },
  };
}

function fromInstanceRecord(entry: Json, where: string): RequestedConnection {
  const name = requireString(entry, "instance_name", where);
  const parent = optionalString(entry, "parent_instance", where);

  return {
    name,
    from: {
      refdes: requireString(entry, "this_net_from_device_refdes", where),
      connector: requireString(entry, "this_net_from_device_connector_name", where),
    },
    to: {
      refdes: requireString(entry, "this_net_to_device_refdes", where),
      connector: requireString(entry, "this_net_to_device_connector_name", where),
    },
    ...(parent ? { groupKey: parent } : {}),
    display: {
      labelAtA: optionalString(entry, "print_name_at_end_a", where) ?? "",
      labelAtB: optionalString(entry, "print_name_at_end_b", where) ?? "",
      centerLabel: optionalString(entry, "print_name", where) ?? "",
      style: readStyle(optionalRecord(entry, "appearance", where), where),
    },
  };
}
