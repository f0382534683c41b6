import { SignJWT, jwtVerify, type JWTPayload } from "jose";

const textEncoder = new TextEncoder();

export const extractBearerToken = (authHeader?: string) => {
  if (!authHeader?.startsWith("Bearer ")) {
    return null;
  }
  return authHeader.slice(7);
};

const readScopes = (payload: JWTPayload) => {
  const scopeValue = payload.scope;
  return Array.isArray(scopeValue)
    ? scopeValue.map(String)
    : typeof scopeValue === "string"
      ? scopeValue.split(" ").filter(Boolean)
      : [];
};

export const verifyServiceJwt = async (
  token: string,
  options: {
    audience: string;
    secret: string;
    issuer?: string;
    subject?: string;
    requiredScopes?: string[];
  }
) => {
  const { payload } = await jwtVerify(token, textEncoder.encode(options.secret), {
    audience: options.audience,
    issuer: options.issuer,
    subject: options.subject
  });
  if (!payload.exp || !payload.aud) {
    throw new Error("jwt_missing_required_claims");
  }
  const scopes = readScopes(payload);
  if (options.requiredScopes?.some((scope) => !scopes.includes(scope))) {
    throw new Error("jwt_missing_required_scope");
  }
  return { payload, scopes };
};

/** Mints the HS256 token a gateway presents to an internal service. */
export const signServiceJwt = async (input: {
  audience: string;
  secret: string;
  ttlSeconds: number;
  scope: string[];
  issuer?: string;
}) => {
  const issuer = input.issuer ?? "app-gateway";
  const nowSeconds = Math.floor(Date.now() / 1000);
  return new SignJWT({ scope: input.scope })
    .setProtectedHeader({ alg: "HS256", typ: "JWT" })
    .setAudience(input.audience)
    .setIssuer(issuer)
    .setSubject(issuer)
    .setIssuedAt(nowSeconds)
    .setExpirationTime(nowSeconds + input.ttlSeconds)
    .sign(textEncoder.encode(input.secret));
};
