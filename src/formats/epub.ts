import type { BookMetadata, CoverImage, FormatHandler, FormatHandlerRegistration, MetadataField } from "./types.ts";
import { createXmlParser, getFirstString } from "./utils.ts";
import { closeArchive, openArchive, readEntry, readEntryText } from "../utils/archive.ts";
import type { Archive } from "../utils/archive.ts";

const OPF_MEDIA_TYPE = "application/oebps-package+xml";

const xmlParser = createXmlParser(["title", "creator", "date", "item", "meta", "rootfile"]);

const IMAGE_MIME_TYPES: Record<string, string> = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  gif: "image/gif",
  webp: "image/webp",
};

interface OPFMeta {
  "@_name"?: string;
  "@_content"?: string;
}

interface OPFItem {
  "@_id"?: string;
  "@_href"?: string;
  "@_media-type"?: string;
  "@_properties"?: string;
}

interface OPFPackage {
  package?: {
    metadata?: {
      title?: unknown;
      creator?: unknown;
      date?: unknown;
      meta?: OPFMeta[];
    };
    manifest?: {
      item?: OPFItem[];
    };
  };
}

interface RootFile {
  "@_full-path"?: string;
  "@_media-type"?: string;
}

interface ContainerXML {
  container?: {
    rootfiles?: {
      rootfile?: RootFile[];
    };
  };
}

function findOpfPath(containerData: ContainerXML): string | undefined {
  const files = containerData.container?.rootfiles?.rootfile ?? [];

  const opf = files.find((f) => f["@_media-type"] === OPF_MEDIA_TYPE);
  if (opf?.["@_full-path"]) return opf["@_full-path"];

  return files.find((f) => f["@_full-path"])?.["@_full-path"];
}

function readMetadata(opfData: OPFPackage, fields: readonly MetadataField[]): BookMetadata {
  const meta = opfData.package?.metadata;
  if (!meta) return {};

  const result: BookMetadata = {};
  for (const field of fields) {
    const value = getFirstString(field === "author" ? meta.creator : meta[field]);
    if (value) result[field] = value;
  }
  return result;
}

/** Manifest item of the cover image: EPUB 2 `<meta name="cover">` first, then EPUB 3 `cover-image` */
function findCoverItem(opfData: OPFPackage): OPFItem | undefined {
  const metas = opfData.package?.metadata?.meta ?? [];
  const manifest = opfData.package?.manifest?.item ?? [];

  const coverId = metas.find((m) => m["@_name"] === "cover")?.["@_content"];
  if (coverId) {
    const item = manifest.find((i) => i["@_id"] === coverId);
    if (item?.["@_href"]) return item;
  }

  return manifest.find((i) => i["@_properties"]?.split(/\s+/).includes("cover-image") && i["@_href"]);
}

function imageMimeType(item: OPFItem, href: string): string {
  const declared = item["@_media-type"];
  if (declared?.startsWith("image/")) return declared;
  const ext = href.split(".").pop()?.toLowerCase() ?? "";
  return IMAGE_MIME_TYPES[ext] ?? "image/jpeg";
}

async function loadPackage(zip: Archive): Promise<{ opfData: OPFPackage; opfDir: string } | null> {
  const container = await readEntryText(zip, "META-INF/container.xml");
  if (!container) return null;

  const containerData: ContainerXML = xmlParser.parse(container);
  const opfPath = findOpfPath(containerData);
  if (!opfPath) return null;

  const opf = await readEntryText(zip, opfPath);
  if (!opf) return null;

  const opfData: OPFPackage = xmlParser.parse(opf);
  return { opfData, opfDir: opfPath.replace(/[^/]+$/, "") };
}

async function createEpubHandler(filePath: string): Promise<FormatHandler | null> {
  const zip = await openArchive(filePath);
  if (!zip) return null;

  try {
    const pkg = await loadPackage(zip);
    if (!pkg) {
      closeArchive(zip);
      return null;
    }
    const { opfData, opfDir } = pkg;

    return {
      getMetadata(fields) {
        return readMetadata(opfData, fields);
      },
      async getCover(): Promise<CoverImage | null> {
        const item = findCoverItem(opfData);
        const href = item?.["@_href"];
        if (!item || !href) return null;

        const data = await readEntry(zip, decodeURIComponent(opfDir + href));
        if (!data) return null;
        return { data, mimeType: imageMimeType(item, href) };
      },
      close() {
        closeArchive(zip);
      },
    };
  } catch {
    closeArchive(zip);
    return null;
  }
}

export const epubHandlerRegistration: FormatHandlerRegistration = {
  extensions: ["epub"],
  create: createEpubHandler,
};
