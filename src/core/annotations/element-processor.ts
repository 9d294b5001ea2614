/**
 * Element Processor
 *
 * Maps `<example>` and `<header>` documentation fragments to OpenAPI examples
 * and headers. Extraction is all-or-nothing: the first malformed element or
 * unresolvable cross-reference fails the whole fragment.
 *
 * @module
 */

import { type AnnotationError, DocumentationError, ErrorCode } from "../errors.js";
import { parseCref } from "../cref/cref.js";
import type { OpenApiAny, OpenApiExample, OpenApiHeader } from "../../types/openapi.js";
import { andThen, collect, err, ok, unwrap, type Result } from "../../types/result.js";
import type { ITypeResolver } from "../reflection/interfaces/ITypeResolver.js";
import type { SchemaReferenceRegistry } from "../schema/schema-reference-registry.js";
import {
  childElements,
  descendantElements,
  firstChildElement,
  getAttribute,
  textContent,
  type DocElement,
} from "../xml/fragment.js";
import { createLogger } from "../../utils/logger.js";
import { SpecificationGenerationMessages as Messages } from "./messages.js";
import { cleanText } from "./text.js";
import { readExampleValue } from "./value-reader.js";

const logger = createLogger("annotations");

/**
 * Tag and attribute names recognized in documentation fragments (case-sensitive)
 */
export const KnownXmlStrings = {
  Example: "example",
  Header: "header",
  Summary: "summary",
  Description: "description",
  Url: "url",
  Value: "value",
  See: "see",
  Cref: "cref",
  Name: "name",
} as const;

export const GENERATED_EXAMPLE_KEY_PREFIX = "example";

// =============================================================================
// Examples
// =============================================================================

/**
 * Extract examples keyed by their `name` attribute, or by `example1`,
 * `example2`, ... in document order when unnamed.
 *
 * @example
 * ```typescript
 * const fragment = unwrap(parseFragment("<parent><example><value>42</value></example></parent>"));
 * const examples = extractExamples(fragment, typeFetcher);
 * // { ok: true, value: { example1: { value: "42" } } }
 * ```
 */
export function extractExamples(
  fragment: DocElement,
  typeResolver: ITypeResolver
): Result<Record<string, OpenApiExample>, AnnotationError> {
  const examples = new Map<string, OpenApiExample>();
  let counter = 1;

  for (const element of findExampleElements(fragment)) {
    const example = toOpenApiExample(element, typeResolver);
    if (!example.ok) return example;
    if (example.value === null) continue;

    const name = getAttribute(element, KnownXmlStrings.Name)?.trim();
    const key = name ? name : `${GENERATED_EXAMPLE_KEY_PREFIX}${counter++}`;
    if (examples.has(key)) {
      return err(
        new DocumentationError(Messages.duplicateName(key, KnownXmlStrings.Example), ErrorCode.DOC_DUPLICATE_KEY, {
          element: KnownXmlStrings.Example,
          name: key,
        })
      );
    }
    examples.set(key, example.value);
  }

  logger.debug({ count: examples.size }, "Extracted examples");
  return ok(Object.fromEntries(examples));
}

/**
 * `example` elements reachable without passing through another `example`
 */
function findExampleElements(parent: DocElement): DocElement[] {
  const found: DocElement[] = [];
  for (const child of childElements(parent)) {
    if (child.name === KnownXmlStrings.Example) {
      found.push(child);
    } else {
      found.push(...findExampleElements(child));
    }
  }
  return found;
}

/**
 * Null when the element has no child elements at all
 */
function toOpenApiExample(
  element: DocElement,
  typeResolver: ITypeResolver
): Result<OpenApiExample | null, AnnotationError> {
  if (childElements(element).length === 0) {
    return ok(null);
  }

  const valueElement = firstChildElement(element, KnownXmlStrings.Value);
  const urlElement = firstChildElement(element, KnownXmlStrings.Url);

  if (valueElement && urlElement) {
    return err(
      new DocumentationError(Messages.ProvideEitherValueOrUrlTag, ErrorCode.DOC_VALUE_AND_URL, {
        element: KnownXmlStrings.Example,
      })
    );
  }

  const example: OpenApiExample = {};
  const summary = optionalChildText(element, KnownXmlStrings.Summary);
  if (summary !== undefined) example.summary = summary;
  const description = optionalChildText(element, KnownXmlStrings.Description);
  if (description !== undefined) example.description = description;

  if (valueElement) {
    const value = readValueElement(valueElement, typeResolver);
    if (!value.ok) return value;
    example.value = value.value;
    return ok(example);
  }

  if (urlElement) {
    example.externalValue = textContent(urlElement).trim();
    return ok(example);
  }

  return err(
    new DocumentationError(Messages.ProvideValueOrUrlForExample, ErrorCode.DOC_MISSING_VALUE_OR_URL, {
      element: KnownXmlStrings.Example,
    })
  );
}

function readValueElement(
  valueElement: DocElement,
  typeResolver: ITypeResolver
): Result<OpenApiAny, AnnotationError> {
  const cref = listValueCrefs(valueElement)[0];
  if (cref !== undefined) {
    return andThen(typeResolver.resolveField(cref), readExampleValue);
  }

  const text = cleanText(textContent(valueElement));
  if (text === undefined) {
    return err(
      new DocumentationError(Messages.ProvideValueForExample, ErrorCode.DOC_MISSING_VALUE, {
        element: KnownXmlStrings.Example,
      })
    );
  }
  return ok(text);
}

// =============================================================================
// Headers
// =============================================================================

/**
 * Extract headers keyed by their required `name` attribute. The header type
 * comes from its `cref` attribute and any `<see cref>` children.
 */
export function extractHeaders(
  fragment: DocElement,
  typeResolver: ITypeResolver,
  schemaRegistry: SchemaReferenceRegistry
): Result<Record<string, OpenApiHeader>, AnnotationError> {
  const headers = new Map<string, OpenApiHeader>();

  for (const element of childElements(fragment, KnownXmlStrings.Header)) {
    const name = getAttribute(element, KnownXmlStrings.Name)?.trim();
    if (!name) {
      return err(
        new DocumentationError(
          Messages.missingAttribute(KnownXmlStrings.Name, KnownXmlStrings.Header),
          ErrorCode.DOC_MISSING_ATTRIBUTE,
          { element: KnownXmlStrings.Header, attribute: KnownXmlStrings.Name }
        )
      );
    }
    if (headers.has(name)) {
      return err(
        new DocumentationError(Messages.duplicateName(name, KnownXmlStrings.Header), ErrorCode.DOC_DUPLICATE_KEY, {
          element: KnownXmlStrings.Header,
          name,
        })
      );
    }

    const schema = andThen(
      andThen(listedTypeNames(element), (typeNames) => typeResolver.loadType(typeNames)),
      (type) => schemaRegistry.findOrAddReference(type)
    );
    if (!schema.ok) return schema;

    const header: OpenApiHeader = { schema: schema.value };
    const description = optionalChildText(element, KnownXmlStrings.Description);
    if (description !== undefined) header.description = description;

    headers.set(name, header);
  }

  logger.debug({ count: headers.size }, "Extracted headers");
  return ok(Object.fromEntries(headers));
}

function listedTypeNames(element: DocElement): Result<string[], AnnotationError> {
  const crefs = listHeaderCrefs(element);
  if (crefs.length === 0) {
    return err(
      new DocumentationError(
        Messages.missingAttribute(KnownXmlStrings.Cref, KnownXmlStrings.Header),
        ErrorCode.DOC_MISSING_ATTRIBUTE,
        { element: KnownXmlStrings.Header, attribute: KnownXmlStrings.Cref }
      )
    );
  }

  return collect(
    crefs.map((raw): Result<string, AnnotationError> => {
      const cref = parseCref(raw);
      if (!cref.ok) return cref;
      if (cref.value.kind !== "type") {
        return err(
          new DocumentationError(Messages.typeCrefRequired(raw, KnownXmlStrings.Header), ErrorCode.DOC_INVALID_CREF, {
            element: KnownXmlStrings.Header,
            cref: raw,
          })
        );
      }
      return ok(cref.value.typeName);
    })
  );
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Non-blank cref values of the `<see>` descendants of a `<value>` element
 */
function listValueCrefs(valueElement: DocElement): string[] {
  return nonBlank(
    descendantElements(valueElement, KnownXmlStrings.See).map((see) => getAttribute(see, KnownXmlStrings.Cref))
  );
}

/**
 * The header's own `cref` attribute followed by those of its direct `<see>`
 * children. References inside `<description>` are prose, not type arguments.
 */
function listHeaderCrefs(header: DocElement): string[] {
  return nonBlank([
    getAttribute(header, KnownXmlStrings.Cref),
    ...childElements(header, KnownXmlStrings.See).map((see) => getAttribute(see, KnownXmlStrings.Cref)),
  ]);
}

function nonBlank(crefs: Array<string | undefined>): string[] {
  return crefs.filter((cref): cref is string => cref !== undefined && cref.trim().length > 0);
}

function optionalChildText(element: DocElement, name: string): string | undefined {
  const child = firstChildElement(element, name);
  return child ? cleanText(textContent(child)) : undefined;
}

// =============================================================================
// Throwing variants
// =============================================================================

/**
 * Like {@link extractExamples}, throwing the extraction error
 */
export function getOpenApiExamples(
  fragment: DocElement,
  typeResolver: ITypeResolver
): Record<string, OpenApiExample> {
  return unwrap(extractExamples(fragment, typeResolver));
}

/**
 * Like {@link extractHeaders}, throwing the extraction error
 */
export function getOpenApiHeaders(
  fragment: DocElement,
  typeResolver: ITypeResolver,
  schemaRegistry: SchemaReferenceRegistry
): Record<string, OpenApiHeader> {
  return unwrap(extractHeaders(fragment, typeResolver, schemaRegistry));
}
