import { AbsolutePins, Point, RawWire } from "../kicad/types";
import { RequestedConnection } from "../connections/types";

/** Pins keyed as "REFDES.PIN". */
export function pinsOf(entries: Record<string, Point>): AbsolutePins {
    const pins: AbsolutePins = new Map();
    for (const [id, p] of Object.entries(entries)) {
        const [refdes, pin] = id.split(".");
        const byName = pins.get(refdes) ?? new Map<string, Point>();
        byName.set(pin, p);
        pins.set(refdes, byName);
    }
    return pins;
}

export function wire(uuid: string, ax: number, ay: number, bx: number, by: number): RawWire {
    return { uuid, a: { x: ax, y: ay }, b: { x: bx, y: by } };
}

export function connection(
    name: string,
    from: string,
    to: string,
    extra: Partial<Pick<RequestedConnection, "groupKey">> = {}
): RequestedConnection {
    const [fromRef, fromPin] = from.split(".");
    const [toRef, toPin] = to.split(".");
    return {
        name,
        from: { refdes: fromRef, connector: fromPin },
        to: { refdes: toRef, connector: toPin },
        ...extra,
        display: {
            labelAtA: `${name}-A`,
            labelAtB: `${name}-B`,
            centerLabel: name,
            style: { baseColor: "blue", outlineColor: "black" },
        },
    };
}
