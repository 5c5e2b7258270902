export interface ConnectionEnd {
  refdes: string;
  connector: string;
}

export interface ConnectionStyle {
  baseColor: string;
  outlineColor: string;
}

export interface ConnectionDisplay {
  labelAtA: string;
  labelAtB: string;
  centerLabel: string;
  style: ConnectionStyle;
}

/**
 * One physical run to draw, as handed over by the channel/circuit mapping
 * step. Both ends are already resolved to a device connector.
 */
export interface RequestedConnection {
  name: string;
  from: ConnectionEnd;
  to: ConnectionEnd;
  /**
   * Connections sharing a group key (e.g. conductors of one cable) count as a
   * single component when sizing a bundle.
   */
  groupKey?: string;
  display: ConnectionDisplay;
}

export const DEFAULT_STYLE: ConnectionStyle = {
  baseColor: "blue",
  outlineColor: "black",
};

export function endpointNodeId(end: ConnectionEnd): string {
  return `${end.refdes}.${end.connector}`;
}
