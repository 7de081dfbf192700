import type { TypeDescriptor } from "./type-descriptor.js";

export const formatTypeName = (type: TypeDescriptor): string => {
  const suffix = type.nullable ? "?" : "";
  switch (type.kind) {
    case "nominal":
      return `${type.name}${suffix}`;
    case "array":
      return `Array<${formatTypeName(type.element)}>${suffix}`;
  }
};
