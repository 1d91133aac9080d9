import { DOMParser, XMLSerializer } from "@xmldom/xmldom";
import { MalformedXmlError } from "../errors";

export const SPREADSHEET_NS =
  "http://schemas.openxmlformats.org/spreadsheetml/2006/main";
export const REL_NS =
  "http://schemas.openxmlformats.org/officeDocument/2006/relationships";
export const PACKAGE_REL_NS =
  "http://schemas.openxmlformats.org/package/2006/relationships";

const XML_DECLARATION =
  '<?xml version="1.0" encoding="UTF-8" standalone="yes"?>';

const ELEMENT_NODE = 1;

export function isElement(node: Node): node is Element {
  return node.nodeType === ELEMENT_NODE;
}

/** Parse a container member; `member` only labels the error. */
export function parseXml(text: string, member: string): Document {
  const problems: string[] = [];
  const parser = new DOMParser({
    errorHandler: (level: string, msg: unknown) => {
      if (level !== "warning") problems.push(String(msg));
    },
  });
  const doc = parser.parseFromString(text.replace(/^\uFEFF/, ""), "text/xml");
  if (problems.length) throw new MalformedXmlError(member, problems[0]);
  if (!doc.documentElement) throw new MalformedXmlError(member, "no root element");
  return doc;
}

export function serializeXml(doc: Document): string {
  const body = new XMLSerializer().serializeToString(doc);
  return body.startsWith("<?xml") ? body : `${XML_DECLARATION}\n${body}`;
}

/** Direct children of `parent` with the given local name in `ns`. */
export function childElements(
  parent: Element,
  localName: string,
  ns: string = SPREADSHEET_NS
): Element[] {
  const found: Element[] = [];
  for (const node of Array.from(parent.childNodes)) {
    if (isElement(node) && node.localName === localName && node.namespaceURI === ns)
      found.push(node);
  }
  return found;
}

export function firstChild(
  parent: Element,
  localName: string,
  ns: string = SPREADSHEET_NS
): Element | null {
  return childElements(parent, localName, ns)[0] ?? null;
}

/** Every descendant of `root` with the given local name in `ns`, in document order. */
export function descendants(
  root: Element,
  localName: string,
  ns: string = SPREADSHEET_NS
): Element[] {
  return Array.from(root.getElementsByTagNameNS(ns, localName));
}

/**
 * Create an element in the namespace of `parent`, reusing its prefix so the
 * serialized output needs no extra namespace declaration.
 */
export function createChildElement(parent: Element, localName: string): Element {
  const doc = parent.ownerDocument;
  const qualified = parent.prefix ? `${parent.prefix}:${localName}` : localName;
  return doc.createElementNS(parent.namespaceURI, qualified);
}
