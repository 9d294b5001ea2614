/**
 * Messages reported for malformed documentation fragments
 */
export const SpecificationGenerationMessages = {
  ProvideEitherValueOrUrlTag: "Provide either value or url in the example tag, not both.",
  ProvideValueOrUrlForExample: "Example must provide either a value or url.",
  ProvideValueForExample: "Example must provide a value.",

  missingAttribute: (attribute: string, tag: string): string =>
    `Missing "${attribute}" attribute in the "${tag}" tag.`,

  duplicateName: (name: string, tag: string): string =>
    `Duplicate ${tag} name "${name}" in documentation fragment.`,

  typeCrefRequired: (cref: string, tag: string): string =>
    `Cross-reference "${cref}" in the "${tag}" tag must reference a type.`,

  fieldHasNoValue: (field: string, type: string): string =>
    `Field "${field}" of type "${type}" has no constant value to use as an example.`,

  invalidExampleJson: (field: string, type: string, reason: string): string =>
    `Value of field "${field}" of type "${type}" is not a valid JSON example: ${reason}`,
} as const;
