import { describe, it, expect, vi, afterAll } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import sharp from "sharp";
import { buildGraph } from "../graph/ConnectivityGraph";
import { layoutGraphSheet } from "../overlay/debug/GraphSheet";
import { sheetToSvg, writeDebugPng } from "../overlay/debug/DebugPng";
import { SheetCanvas, drawGraphSheet, writeGraphPdf } from "../overlay/debug/GraphSheetPdf";
import { pinsOf, wire } from "./helpers";

// Mock PDFDocument
class MockCanvas implements SheetCanvas {
    lineWidth = vi.fn((_width: number) => this);
    strokeColor = vi.fn((_color: string) => this);
    moveTo = vi.fn((_x: number, _y: number) => this);
    lineTo = vi.fn((_x: number, _y: number) => this);
    stroke = vi.fn(() => this);
    polygon = vi.fn((..._points: Array<[number, number]>) => this);
    fill = vi.fn((_color: string) => this);
    circle = vi.fn((_x: number, _y: number, _radius: number) => this);
    fillAndStroke = vi.fn((_fill: string, _stroke: string) => this);
    fontSize = vi.fn((_size: number) => this);
    fillColor = vi.fn((_color: string) => this);
    widthOfString = vi.fn((text: string) => text.length * 10);
    text = vi.fn((_text: string, _x: number, _y: number, _options: { lineBreak: boolean }) => this);
}

describe("Graph debug sheet", () => {
    const { graph } = buildGraph(pinsOf({ "A.1": { x: 0, y: 0 }, "B.1": { x: 1, y: 0 } }), [wire("w1", 0, 0, 1, 0)]);
    const sheet = layoutGraphSheet(graph, [{ kind: "label", text: "NET_A", at: { x: 0.5, y: 0.2 }, angle: 0 }]);
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "net-overlay-sheet-"));

    afterAll(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true });
    });

    it("lays out segments, nodes, labels and a legend", () => {
        expect(sheet.lines).toHaveLength(2);
        expect(sheet.lines[0]).toEqual({ from: { x: 0.5, y: 0.5 }, to: { x: 1.5, y: 0.5 }, color: "black", width: 0.02 });
        expect(sheet.polygons).toHaveLength(2);
        expect(sheet.polygons[0].points[0]).toEqual({ x: 1.5, y: 0.5 });
        expect(sheet.circles).toHaveLength(3);
        expect(sheet.texts.map((t) => t.text)).toEqual([
            "w1",
            "A.1",
            "B.1",
            "NET_A",
            "= Node (identified by label)",
            "= Wire (arrow points from End A to End B)",
        ]);
    });

    it("draws the sheet onto a PDF page in points", () => {
        const doc = new MockCanvas();
        drawGraphSheet(doc, sheet);

        expect(doc.moveTo).toHaveBeenNthCalledWith(1, 36, 36);
        expect(doc.lineTo).toHaveBeenNthCalledWith(1, 108, 36);
        expect(doc.stroke).toHaveBeenCalledTimes(2);
        expect(doc.fill).toHaveBeenCalledTimes(2);
        expect(doc.fillAndStroke).toHaveBeenCalledTimes(3);
        expect(doc.text).toHaveBeenCalledTimes(6);
        // "w1" centred: 20pt wide at x = 72pt, raised by the label offset
        expect(doc.text.mock.calls[0][0]).toBe("w1");
        expect(doc.text.mock.calls[0][1]).toBeCloseTo(62, 9);
        expect(doc.text.mock.calls[0][2]).toBeCloseTo(36 - 5.4 - 0.6, 9);
    });

    it("writes a single-page PDF", async () => {
        const file = path.join(tmpDir, "graph.pdf");
        await writeGraphPdf(sheet, file);
        expect(fs.readFileSync(file).subarray(0, 5).toString("latin1")).toBe("%PDF-");
    });

    it("renders the sheet as a pixel-space SVG", () => {
        const lines = sheetToSvg(sheet, 100).split("\n");
        expect(lines[0]).toBe('<svg xmlns="http://www.w3.org/2000/svg" width="1100" height="850" viewBox="0 0 1100 850">');
        expect(lines[2]).toBe('<line x1="50.000" y1="50.000" x2="150.000" y2="50.000" stroke="black" stroke-width="2.000"/>');
        expect(lines[lines.length - 1]).toBe("</svg>");
    });

    it("rasterizes the sheet to PNG", async () => {
        const file = path.join(tmpDir, "graph.png");
        await writeDebugPng(sheet, file, 30);
        const meta = await sharp(file).metadata();
        expect(meta.format).toBe("png");
        expect(meta.width).toBe(330);
        expect(meta.height).toBe(255);
    });
});
