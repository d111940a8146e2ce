export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export type ContentTag = "h1" | "h2" | "h3" | "p";

export type TaggedBlock = {
  tag: ContentTag;
  text: string;
  index: number;
};

export type EmbeddedField = {
  field: "text" | "strHTML";
  original: string;
  clean: string;
  index: number;
};

export type LinkedText = {
  text: string;
  hyperlink: string | null;
  index: number;
};

export type ParsedFile<TItem> = {
  file_path: string;
  url: string | null;
  topic: string | null;
  content: TItem[];
  content_count: number;
};

export type ParsedHtmlFile = ParsedFile<TaggedBlock> & {
  filename: string;
  next_data_fields: EmbeddedField[];
  next_data_count: number;
};

export type ParsedJsonFile = ParsedFile<LinkedText>;

export type ParsedDirectory<TFile> = {
  total_files: number;
  source_directory: string;
  files: TFile[];
};

export type AggregateEntry = {
  source_file: string;
  topic: string | null;
  source_url: string | null;
  data: JsonValue;
};

export type AggregateDocument = {
  metadata: {
    total_files: number;
    source_directory: string;
    files_processed: string[];
  };
  content: AggregateEntry[];
};
