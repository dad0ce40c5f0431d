// src/auth.ts
import { SignJWT, jwtVerify, type JWTPayload } from "jose";
import { AuthError } from "./errors";

/**
 * Opaque, already-validated access to the video platform. The pipeline
 * never looks inside; it only hands this to the uploader.
 */
export interface CredentialHandle {
    subject: string;
    accessToken: string;
}

export interface SessionClaims {
    sub: string;
    platformToken: string;
}

const encoder = new TextEncoder();

export class SessionTokens {
    private readonly secret: Uint8Array;
    private readonly expiresIn: string;

    constructor(secret: string, expiresIn = "2h") {
        this.secret = encoder.encode(secret);
        this.expiresIn = expiresIn;
    }

    async issueToken(claims: SessionClaims): Promise<string> {
        return await new SignJWT({ platformToken: claims.platformToken })
            .setProtectedHeader({ alg: "HS256" })
            .setSubject(claims.sub)
            .setIssuedAt()
            .setExpirationTime(this.expiresIn)
            .sign(this.secret);
    }

    async verifyToken(token: string): Promise<CredentialHandle> {
        let payload: JWTPayload;
        try {
            ({ payload } = await jwtVerify(token, this.secret, { algorithms: ["HS256"] }));
        } catch (error) {
            throw new AuthError("Invalid token", { cause: error });
        }

        if (typeof payload.sub !== "string" || typeof payload.platformToken !== "string" || !payload.platformToken) {
            throw new AuthError("Token does not carry platform credentials");
        }
        return { subject: payload.sub, accessToken: payload.platformToken };
    }
}
