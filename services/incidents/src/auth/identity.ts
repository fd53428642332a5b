import { TOKEN_SCOPES, type TokenDefinition, type TokenScope } from '../config/serviceConfig';

export type AuthIdentity = {
  subject: string;
  kind: 'user' | 'service';
  scopes: Set<TokenScope>;
};

function toScopeSet(definition: TokenDefinition): Set<TokenScope> {
  if (definition.scopes === '*' || definition.scopes.includes('incidents:admin')) {
    return new Set(TOKEN_SCOPES);
  }
  return new Set(definition.scopes);
}

export function createIdentityFromToken(definition: TokenDefinition): AuthIdentity {
  return {
    subject: definition.subject,
    kind: definition.kind,
    scopes: toScopeSet(definition)
  } satisfies AuthIdentity;
}

export function createDisabledIdentity(): AuthIdentity {
  return {
    subject: 'local-dev',
    kind: 'service',
    scopes: new Set(TOKEN_SCOPES)
  } satisfies AuthIdentity;
}

export function hasScope(identity: AuthIdentity, scope: TokenScope): boolean {
  return identity.scopes.has(scope) || identity.scopes.has('incidents:admin');
}
