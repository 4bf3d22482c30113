// Physical constants and fixed unit scale factors shared by the calculators.

export const EPSILON_0 = 8.854e-12; // vacuum permittivity (F/m)

// Relative permittivity of the two stock dielectrics
export const EPSILON_R_GLASS = 7.0;   // wine glass
export const EPSILON_R_PLASTIC = 2.5; // polyethylene bag

export const EPSILON_R_DEFAULT = EPSILON_R_GLASS;

/** Target remaining fraction for the discharge query: 40% lost, 60% left. */
export const REMAINING_FRACTION = 0.6;

export const UNIT = {
  CM2_TO_M2: 1e-4,
  MM_TO_M: 1e-3,
  PF_TO_F: 1e-12,
  ML_TO_L: 1e-3,
  MOHM_TO_OHM: 1e6,
  C_TO_UC: 1e6,
  F_TO_PF: 1e12,
  F_TO_NF: 1e9,
  S_TO_MS: 1e3,
} as const;
