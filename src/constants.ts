export const GTO_LIST_FORMATS = 'gto_list_formats' as const;
export const GTO_PARSE_BASIS_SETS = 'gto_parse_basis_sets' as const;
export const GTO_PARSE_PSEUDOPOTENTIALS = 'gto_parse_pseudopotentials' as const;
export const GTO_WRITE_BASIS_SETS = 'gto_write_basis_sets' as const;
export const GTO_WRITE_PSEUDOPOTENTIALS = 'gto_write_pseudopotentials' as const;
export const GTO_CONVERT_BASIS_SETS = 'gto_convert_basis_sets' as const;
export const GTO_CONVERT_PSEUDOPOTENTIALS = 'gto_convert_pseudopotentials' as const;
export const GTO_DESCRIBE_BASIS_SET = 'gto_describe_basis_set' as const;
export const GTO_UNCONTRACT_BASIS_SET = 'gto_uncontract_basis_set' as const;

export type GtoToolName =
  | typeof GTO_LIST_FORMATS
  | typeof GTO_PARSE_BASIS_SETS
  | typeof GTO_PARSE_PSEUDOPOTENTIALS
  | typeof GTO_WRITE_BASIS_SETS
  | typeof GTO_WRITE_PSEUDOPOTENTIALS
  | typeof GTO_CONVERT_BASIS_SETS
  | typeof GTO_CONVERT_PSEUDOPOTENTIALS
  | typeof GTO_DESCRIBE_BASIS_SET
  | typeof GTO_UNCONTRACT_BASIS_SET;

export const DATA_DIR_ENV = 'GTO_DATA_DIR' as const;
export const TOOL_MODE_ENV = 'GTO_TOOL_MODE' as const;
