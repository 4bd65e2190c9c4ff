import { MapperFn } from "./pattern/types";

// What a rule table may refer to by name but cannot define itself
interface DecoderEnvironment {
  // Pure mapping functions used as `where { v: Type = fn(v) }`
  mappers?: Record<string, MapperFn>;
  // Enum objects used to resolve `Type::Variant` constants
  enums?: Record<string, Record<string, string | number>>;
}

export type { DecoderEnvironment };
