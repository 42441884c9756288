// Content tree handed to the block builder: the children of w:body, in order.

export type ParagraphNode = {
  kind: "paragraph";
  // Text of each w:t, in run order.
  runs: string[];
};

export type TableCellNode = {
  children: Array<ParagraphNode | TableNode | OtherNode>;
};

export type TableRowNode = {
  cells: TableCellNode[];
};

export type TableNode = {
  kind: "table";
  rows: TableRowNode[];
};

export type OtherNode = {
  kind: "other";
  // Element name without its namespace prefix, e.g. "sdt" or "sectPr".
  tag: string;
};

export type ContentNode = ParagraphNode | TableNode | OtherNode;

export type IngestOptions = {
  mime?: string;
  filename?: string;
};
