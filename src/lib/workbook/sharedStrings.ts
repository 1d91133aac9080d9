import type { WorkbookArchive } from "./archive/archive";
import { childElements, descendants, parseXml } from "./xml/xml";

export const DEFAULT_SHARED_STRINGS_PART = "xl/sharedStrings.xml";

// Text of an <si>: every <t> run joined, phonetic guide runs (<rPh>) excluded.
function stringItemText(si: Element): string {
  return descendants(si, "t")
    .filter((t) => !isInsidePhonetic(t, si))
    .map((t) => t.textContent ?? "")
    .join("");
}

function isInsidePhonetic(node: Node, stop: Element): boolean {
  for (let p = node.parentNode; p && p !== stop; p = p.parentNode) {
    if (p.nodeName === "rPh" || p.nodeName.endsWith(":rPh")) return true;
  }
  return false;
}

/** Shared string table in index order; `[]` when the member is absent. */
export async function loadSharedStrings(
  archive: WorkbookArchive,
  path = DEFAULT_SHARED_STRINGS_PART
): Promise<string[]> {
  if (!archive.has(path)) return [];
  const doc = parseXml(await archive.readText(path), path);
  return childElements(doc.documentElement, "si").map(stringItemText);
}
