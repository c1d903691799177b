import { ConfigError } from "../errors.js";
import { readJsonFile, readYamlFile } from "../pipeline/utils.js";
import type { CatalogueHandle, CatalogueLoader, SnapshotHandle, SnapshotLoader } from "./contracts.js";
import { CatalogueFileSchema, RegistrationFileSchema, SnapshotFileSchema, type DerivedQuantity } from "./formats.js";

function evaluateDerived(name: string, def: DerivedQuantity, quantities: Record<string, number[]>): number[] {
  const operands = def.of.map((q) => {
    const values = quantities[q];
    if (!values) throw new ConfigError(`Derived quantity ${name} refers to unknown quantity ${q}.`);
    return values;
  });
  const [a, b] = operands;
  return a.map((value, i) => {
    switch (def.op) {
      case "ratio":
        return value / b[i];
      case "product":
        return value * b[i];
      case "sum":
        return value + b[i];
      case "difference":
        return value - b[i];
      case "log10":
        return Math.log10(value);
    }
  });
}

/**
 * Adds derived quantities to a catalogue. Definitions are applied in file order,
 * so later entries may build on earlier ones.
 */
export async function applyRegistration(catalogue: CatalogueHandle, registrationFile: string): Promise<CatalogueHandle> {
  const parsed = RegistrationFileSchema.safeParse(await readYamlFile(registrationFile));
  if (!parsed.success) {
    throw new ConfigError(`Invalid registration file ${registrationFile}: ${parsed.error.message}`);
  }

  const quantities = { ...catalogue.quantities };
  for (const [name, def] of Object.entries(parsed.data.derived)) {
    quantities[name] = evaluateDerived(name, def, quantities);
  }
  return { ...catalogue, quantities };
}

export const jsonCatalogueLoader: CatalogueLoader = {
  async load(filePath, registrationFile) {
    const parsed = CatalogueFileSchema.safeParse(await readJsonFile(filePath));
    if (!parsed.success) throw new ConfigError(`Invalid catalogue ${filePath}: ${parsed.error.message}`);

    const first = Object.values(parsed.data.quantities)[0];
    const catalogue: CatalogueHandle = {
      path: filePath,
      length: first ? first.length : 0,
      quantities: parsed.data.quantities,
      units: parsed.data.units ?? {}
    };
    return registrationFile ? await applyRegistration(catalogue, registrationFile) : catalogue;
  }
};

export const jsonSnapshotLoader: SnapshotLoader = {
  async load(filePath) {
    const parsed = SnapshotFileSchema.safeParse(await readJsonFile(filePath));
    if (!parsed.success) throw new ConfigError(`Invalid snapshot header ${filePath}: ${parsed.error.message}`);

    const { run_name: runName, ...rest } = parsed.data.metadata;
    const handle: SnapshotHandle = {
      path: filePath,
      runName: runName ?? null,
      metadata: rest
    };
    return handle;
  }
};
