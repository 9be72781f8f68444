import { LICENSE_PROPERTIES } from "../constants/licenseProperties";
import {
  freshHtmlFlags,
  licenseFieldsFrom,
  type LicenseFields,
  type LicenseHtmlFlags,
  type LicenseInit,
} from "../types/license";
import type { LicenseTextServices } from "../utils/licenseText";
import type { LicenseNode, TripleStore } from "../utils/tripleStore";
import { detachedSink, GraphFieldSink, type LicenseFieldSink } from "./licenseFieldSink";
import { readLicenseFields } from "./licenseReader";

function textValues(value: string | null): string[] {
  return value === null ? [] : [value];
}

/**
 * A license record.
 *
 * Instances built with `License.create` are detached: setters change memory
 * only. Instances returned by `loadLicense` / `projectLicense` are
 * `BoundLicense`s whose setters also replace the field's triples, memory
 * first, then store. If the store throws, memory already holds the new value.
 */
export class License {
  protected fields: LicenseFields;
  protected readonly flags: LicenseHtmlFlags;
  protected readonly sink: LicenseFieldSink;

  protected constructor(fields: LicenseFields, sink: LicenseFieldSink, flags: LicenseHtmlFlags = freshHtmlFlags()) {
    this.fields = { ...fields, seeAlsoUrls: [...fields.seeAlsoUrls] };
    this.sink = sink;
    this.flags = { ...flags };
  }

  static create(init: LicenseInit): License {
    return new License(licenseFieldsFrom(init), detachedSink);
  }

  get isBound(): boolean {
    return this.sink.bound;
  }

  get licenseId(): string { return this.fields.licenseId; }
  get name(): string | null { return this.fields.name; }
  get bodyText(): string | null { return this.fields.bodyText; }
  get standardHeader(): string | null { return this.fields.standardHeader; }
  get standardTemplate(): string | null { return this.fields.standardTemplate; }
  get osiApproved(): boolean { return this.fields.osiApproved; }
  get comment(): string | null { return this.fields.comment; }
  get seeAlsoUrls(): string[] { return [...this.fields.seeAlsoUrls]; }

  get bodyTextIsHtml(): boolean { return this.flags.bodyTextIsHtml; }
  get templateIsHtml(): boolean { return this.flags.templateIsHtml; }

  setLicenseId(licenseId: string): void {
    this.fields.licenseId = licenseId;
    this.sink.write(LICENSE_PROPERTIES.licenseId, licenseId ? [licenseId] : []);
  }

  setName(name: string | null): void {
    this.fields.name = name;
    this.sink.write(LICENSE_PROPERTIES.name, textValues(name));
  }

  setBodyText(text: string | null): void {
    this.fields.bodyText = text;
    this.flags.bodyTextIsHtml = false;
    this.sink.write(LICENSE_PROPERTIES.bodyText, textValues(text));
  }

  setStandardHeader(header: string | null): void {
    this.fields.standardHeader = header;
    this.sink.write(LICENSE_PROPERTIES.standardHeader, textValues(header));
  }

  setStandardTemplate(template: string | null): void {
    this.fields.standardTemplate = template;
    this.flags.templateIsHtml = false;
    this.sink.write(LICENSE_PROPERTIES.standardTemplate, textValues(template));
  }

  // false is the implied default on read, so it is never written
  setOsiApproved(osiApproved: boolean): void {
    this.fields.osiApproved = osiApproved;
    this.sink.write(LICENSE_PROPERTIES.osiApproved, osiApproved ? ["true"] : []);
  }

  setComment(comment: string | null): void {
    this.fields.comment = comment;
    this.sink.write(LICENSE_PROPERTIES.comment, textValues(comment));
  }

  setSeeAlsoUrls(urls: readonly string[]): void {
    this.fields.seeAlsoUrls = [...urls];
    this.sink.write(LICENSE_PROPERTIES.seeAlso, urls);
  }

  /** Copies every field of `source` through the setters, template included. */
  copyFrom(source: License): void {
    this.setComment(source.comment);
    this.setLicenseId(source.licenseId);
    this.setBodyText(source.bodyText);
    this.setName(source.name);
    this.setOsiApproved(source.osiApproved);
    this.setSeeAlsoUrls(source.seeAlsoUrls);
    this.setStandardHeader(source.standardHeader);
    this.setStandardTemplate(source.standardTemplate);
  }

  /** Detached copy with the same field values. */
  clone(): License {
    return License.create(this.snapshot());
  }

  snapshot(): LicenseFields {
    return { ...this.fields, seeAlsoUrls: [...this.fields.seeAlsoUrls] };
  }

  htmlFlags(): LicenseHtmlFlags {
    return { ...this.flags };
  }

  // only the id, so the result can be parsed back as a license reference
  toString(): string {
    return this.licenseId;
  }
}

/**
 * A license backed by a node in a triple store.
 */
export class BoundLicense extends License {
  readonly store: TripleStore;
  readonly node: LicenseNode;
  private readonly services: LicenseTextServices;

  constructor(
    store: TripleStore,
    node: LicenseNode,
    fields: LicenseFields,
    flags: LicenseHtmlFlags,
    services: LicenseTextServices,
  ) {
    super(fields, new GraphFieldSink(store, node), flags);
    this.store = store;
    this.node = node;
    this.services = services;
  }

  /**
   * Re-reads every field from the store. Body and template are converted
   * from HTML only if no setter has touched them on this instance.
   */
  reload(): void {
    this.fields = readLicenseFields(this.store, this.node, this.flags, this.services);
  }
}
