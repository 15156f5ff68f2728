export interface ImportedItem {
  name: string;
  alias?: string;
}

export interface Reference {
  /** Target as written in the document, e.g. `@.models.user` or `@../core/db`. */
  targetPath: string;
  importedItems: ImportedItem[];
}

export interface MethodSignature {
  name: string;
  params: string;
  returnType?: string;
  isAsync: boolean;
}

export interface PropertySignature {
  name: string;
  type?: string;
}

export interface ClassComponent {
  kind: "class";
  name: string;
  baseClass?: string;
  methods: MethodSignature[];
  properties: PropertySignature[];
}

export interface FunctionComponent {
  kind: "function";
  name: string;
  params: string;
  returnType?: string;
  isAsync: boolean;
}

export interface ConstantComponent {
  kind: "constant";
  name: string;
  type?: string;
  value?: string;
}

export interface TypeAliasComponent {
  kind: "type-alias";
  name: string;
  value: string;
}

export type Component = ClassComponent | FunctionComponent | ConstantComponent | TypeAliasComponent;

export interface Blueprint {
  readonly moduleName: string;
  readonly description: string;
  readonly references: readonly Reference[];
  readonly components: readonly Component[];
  readonly notes: readonly string[];
  readonly requirements: readonly string[];
  readonly sections: Readonly<Record<string, readonly string[]>>;
  /** Package names declared next to references that are not blueprints themselves. */
  readonly externalDependencies: readonly string[];
  readonly rawText: string;
  /** Absolute path of the document the blueprint was parsed from. */
  readonly sourceLocation?: string;
}

export interface ParsedBlueprint {
  blueprint: Blueprint;
  warnings: string[];
}
