/**
 * DI tokens: spec collaborators, infrastructure, config and the lab.
 * container.ts registers each one only when a test has not already done so.
 */
export const DI = {
  // ═══════════════════════════════════════════════════════════════════
  // SPECS
  // ═══════════════════════════════════════════════════════════════════
  Specs: {
    /** Process-wide spec registry */
    Registry: Symbol('Specs.Registry'),
    /** Program compiler (body → deferred computation) */
    Compiler: Symbol('Specs.Compiler'),
    /** Replay / historical-get factories */
    ReplayFactory: Symbol('Specs.ReplayFactory'),
    /** Manifest producer */
    ManifestProducer: Symbol('Specs.ManifestProducer'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // SERVICES
  // ═══════════════════════════════════════════════════════════════════
  Services: {
    /** Registration pipeline facade */
    Lab: Symbol('Services.Lab'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // INFRASTRUCTURE
  // ═══════════════════════════════════════════════════════════════════
  Infra: {
    /** Component logger factory */
    LoggerFactory: Symbol('Infra.LoggerFactory'),
    /** Wall clock */
    Clock: Symbol('Infra.Clock'),
  },

  // ═══════════════════════════════════════════════════════════════════
  // CONFIGURATION
  // ═══════════════════════════════════════════════════════════════════
  Config: {
    /** Complete application configuration (validated) */
    App: Symbol('Config.App'),
  },
} as const;

/** Type helper for token values */
export type DIToken = typeof DI[keyof typeof DI][keyof typeof DI[keyof typeof DI]];
