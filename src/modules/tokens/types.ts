// src/modules/tokens/types.ts
// ============================================================================
// Refresh-Tokens (auth.tokens, type = 'refresh')
// ----------------------------------------------------------------------------
// Gespeichert wird nur der sha256-Hash, der Klartext geht einmalig an den
// Client (Access-Grant).
// ============================================================================

export interface RefreshTokenRow {
  id: string;
  tenant_id: string;
  user_id: string;
  type: "refresh";
  token_hash: string;
  expires_at: Date;
  created_at: Date;
}

export interface RefreshTokenRepository {
  create(input: { userId: string; tokenHash: string; expiresAt: Date; now: Date }): Promise<RefreshTokenRow>;
}
