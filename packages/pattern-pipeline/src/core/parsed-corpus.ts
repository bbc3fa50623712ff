import type {
  MarkValue,
  ParsedFile,
  ParsedFileSeed,
  TextElement,
} from '@altokit/model';

import { ModelIntegrityError } from '../errors/pipeline-error';

interface AllElementsOptions {
  /**
   * Include soft-deleted elements (default: false)
   */
  includeRemoved?: boolean;
}

/**
 * ParsedCorpus
 *
 * Owns every text element of a parse run. Elements are created once from the
 * parser seeds and keep their identity and order for the lifetime of the
 * corpus; only the annotation fields are written, through the mutators below.
 */
export class ParsedCorpus {
  private readonly fileMap = new Map<string, ParsedFile>();
  private readonly ordered: TextElement[] = [];
  private readonly owned = new WeakSet<TextElement>();

  private constructor(seeds: readonly ParsedFileSeed[]) {
    for (const seed of seeds) {
      this.addFile(seed);
    }
  }

  /**
   * Build a corpus from parser output
   *
   * @throws ModelIntegrityError on an empty or duplicate element id, or a
   *   file path that appears twice
   */
  static fromFiles(seeds: readonly ParsedFileSeed[]): ParsedCorpus {
    return new ParsedCorpus(seeds);
  }

  static empty(): ParsedCorpus {
    return new ParsedCorpus([]);
  }

  /**
   * Number of elements, removed ones included
   */
  get size(): number {
    return this.ordered.length;
  }

  get removedCount(): number {
    return this.ordered.filter((element) => element.removed).length;
  }

  /**
   * Non-removed elements in file order, then document order
   */
  elements(): TextElement[] {
    return this.ordered.filter((element) => !element.removed);
  }

  allElements(options: AllElementsOptions = {}): TextElement[] {
    return options.includeRemoved
      ? [...this.ordered]
      : this.elements();
  }

  files(): ParsedFile[] {
    return [...this.fileMap.values()];
  }

  getFile(path: string): ParsedFile | undefined {
    return this.fileMap.get(path);
  }

  /**
   * @throws ModelIntegrityError when the element is not part of this corpus
   */
  fileOf(element: TextElement): ParsedFile {
    this.assertOwned(element);
    const file = this.fileMap.get(element.sourceFile);
    if (!file) {
      throw new ModelIntegrityError(
        `Element '${element.id}' refers to unknown file '${element.sourceFile}'`,
        { filePath: element.sourceFile, elementId: element.id },
      );
    }
    return file;
  }

  /**
   * Overwrites any previous category
   */
  assignCategory(element: TextElement, label: string): void {
    this.assertOwned(element);
    element.category = label;
  }

  recordMatch(element: TextElement, operationId: string, value?: string): void {
    this.assertOwned(element);
    element.matchedBy.push(operationId);
    if (value !== undefined) {
      element.matchedValues[operationId] = value;
    }
  }

  setMark(element: TextElement, name: string, value: MarkValue): void {
    this.assertOwned(element);
    element.marks[name] = value;
  }

  /**
   * @returns true when the element was not removed before
   */
  markRemoved(element: TextElement): boolean {
    this.assertOwned(element);
    if (element.removed) {
      return false;
    }
    element.removed = true;
    return true;
  }

  private addFile(seed: ParsedFileSeed): void {
    if (this.fileMap.has(seed.path)) {
      throw new ModelIntegrityError(`Duplicate file '${seed.path}' in corpus`, {
        filePath: seed.path,
      });
    }

    const seen = new Set<string>();
    const elements: TextElement[] = seed.elements.map((elementSeed, index) => {
      if (!elementSeed.id) {
        throw new ModelIntegrityError(
          `Element at index ${index} in '${seed.path}' has no id`,
          { filePath: seed.path },
        );
      }
      if (seen.has(elementSeed.id)) {
        throw new ModelIntegrityError(
          `Duplicate element id '${elementSeed.id}' in '${seed.path}'`,
          { filePath: seed.path, elementId: elementSeed.id },
        );
      }
      seen.add(elementSeed.id);

      return {
        id: elementSeed.id,
        type: elementSeed.type,
        text: elementSeed.text,
        position: Object.freeze({ ...elementSeed.position }),
        sourceFile: seed.path,
        parentId: elementSeed.parentId,
        category: null,
        matchedBy: [],
        matchedValues: {},
        marks: {},
        removed: false,
      };
    });

    for (const element of elements) {
      this.owned.add(element);
      this.ordered.push(element);
    }

    this.fileMap.set(seed.path, {
      path: seed.path,
      fileName: seed.fileName,
      metadata: Object.freeze({ ...seed.metadata }),
      elements,
    });
  }

  private assertOwned(element: TextElement): void {
    if (!this.owned.has(element)) {
      throw new ModelIntegrityError(
        `Element '${element.id}' of '${element.sourceFile}' does not belong to this corpus`,
        { filePath: element.sourceFile, elementId: element.id },
      );
    }
  }
}
