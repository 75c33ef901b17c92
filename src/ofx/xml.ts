/**
 * Creates `<name>text</name>`
 */
export function textElement(doc: Document, name: string, text: string): Element {
  const element = doc.createElement(name);
  element.appendChild(doc.createTextNode(text));
  return element;
}

/**
 * Creates `<name>` holding the given children, in order
 */
export function parentElement(doc: Document, name: string, children: Element[]): Element {
  const element = doc.createElement(name);
  for (const child of children) {
    element.appendChild(child);
  }
  return element;
}
