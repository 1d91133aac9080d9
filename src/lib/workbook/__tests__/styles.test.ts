import { describe, expect, it } from "vitest";
import { ensureCellXf, ensureDateStyle, ensureNumFmt } from "../styles";
import { childElements, firstChild, serializeXml, SPREADSHEET_NS } from "../xml/xml";
import { MINIMAL_STYLES, xmlDoc } from "./fixtures";

function section(doc: Document, name: string): Element {
  const el = firstChild(doc.documentElement, name);
  if (!el) throw new Error(`<${name}> missing`);
  return el;
}

function attrs(el: Element): Record<string, string> {
  return Object.fromEntries(Array.from(el.attributes).map((a) => [a.name, a.value]));
}

describe("ensureDateStyle", () => {
  it("adds numFmts as the first child and a cloned cellXfs record", () => {
    const doc = xmlDoc(MINIMAL_STYLES);
    expect(ensureDateStyle(doc)).toEqual({ numFmtId: 164, xfIndex: 1 });

    const root = doc.documentElement;
    const first = childElements(root, "numFmts")[0];
    expect(first).toBeDefined();
    expect(Array.from(root.childNodes).find((n) => n.nodeType === 1)).toBe(first);
    const numFmts = section(doc, "numFmts");
    expect(numFmts.getAttribute("count")).toBe("1");
    expect(attrs(childElements(numFmts, "numFmt")[0])).toEqual({
      numFmtId: "164",
      formatCode: "yyyy-mm-dd hh:mm",
    });

    const cellXfs = section(doc, "cellXfs");
    expect(cellXfs.getAttribute("count")).toBe("2");
    expect(attrs(childElements(cellXfs, "xf")[1])).toEqual({
      numFmtId: "164",
      fontId: "0",
      fillId: "0",
      borderId: "0",
      xfId: "0",
      applyNumberFormat: "1",
    });
  });

  it("is idempotent across serialize and reparse", () => {
    const doc = xmlDoc(MINIMAL_STYLES);
    const first = ensureDateStyle(doc);
    const again = xmlDoc(serializeXml(doc));
    expect(ensureDateStyle(again)).toEqual(first);
    expect(childElements(section(again, "numFmts"), "numFmt")).toHaveLength(1);
    expect(childElements(section(again, "cellXfs"), "xf")).toHaveLength(2);
  });

  it("allocates above the highest existing custom id", () => {
    const doc = xmlDoc(
      `<styleSheet xmlns="${SPREADSHEET_NS}">` +
        '<numFmts count="2"><numFmt numFmtId="170" formatCode="0.000"/><numFmt numFmtId="165" formatCode="@"/></numFmts>' +
        '<cellXfs count="1"><xf numFmtId="0" fontId="2" applyFont="1"/></cellXfs>' +
        "</styleSheet>"
    );
    expect(ensureNumFmt(doc, "dd/mm/yyyy")).toBe(171);
    expect(section(doc, "numFmts").getAttribute("count")).toBe("3");
    expect(ensureCellXf(doc, 171)).toBe(1);
    expect(attrs(childElements(section(doc, "cellXfs"), "xf")[1])).toEqual({
      numFmtId: "171",
      fontId: "2",
      applyFont: "1",
      applyNumberFormat: "1",
    });
  });

  it("reuses an existing format code and record", () => {
    const doc = xmlDoc(
      `<styleSheet xmlns="${SPREADSHEET_NS}">` +
        '<numFmts count="1"><numFmt numFmtId="200" formatCode="yyyy-mm-dd hh:mm"/></numFmts>' +
        '<cellXfs count="3"><xf numFmtId="0"/><xf numFmtId="200"/><xf numFmtId="200" applyNumberFormat="true"/></cellXfs>' +
        "</styleSheet>"
    );
    expect(ensureDateStyle(doc)).toEqual({ numFmtId: 200, xfIndex: 2 });
    expect(childElements(section(doc, "cellXfs"), "xf")).toHaveLength(3);
  });

  it("uses minimal defaults when cellXfs is missing", () => {
    const doc = xmlDoc(
      `<styleSheet xmlns="${SPREADSHEET_NS}"><fonts count="1"><font/></fonts><cellStyles count="0"/></styleSheet>`
    );
    expect(ensureDateStyle(doc, "d-mmm-yy")).toEqual({ numFmtId: 164, xfIndex: 0 });
    const names = Array.from(doc.documentElement.childNodes)
      .filter((n): n is Element => n.nodeType === 1)
      .map((n) => n.localName);
    expect(names).toEqual(["numFmts", "fonts", "cellXfs", "cellStyles"]);
    expect(attrs(childElements(section(doc, "cellXfs"), "xf")[0])).toEqual({
      numFmtId: "164",
      fontId: "0",
      fillId: "0",
      borderId: "0",
      xfId: "0",
      applyNumberFormat: "1",
    });
  });

  it("keeps new elements in the default namespace", () => {
    const doc = xmlDoc(MINIMAL_STYLES);
    ensureDateStyle(doc);
    const text = serializeXml(doc);
    expect(text.startsWith('<?xml version="1.0" encoding="UTF-8" standalone="yes"?>')).toBe(true);
    expect(text.match(/xmlns="/g)).toHaveLength(1);
  });
});
