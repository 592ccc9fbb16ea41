/**
 * Fehlerklassen für die FoxESS Cloud.
 *
 * Alles was vom Client geworfen wird ist ein FoxessApiError; der Coordinator
 * unterscheidet nur zwischen Authentifizierung (Polling stoppt) und allem anderen.
 */
export class FoxessApiError extends Error {
  constructor(
    message: string,
    public errno?: number,
    public httpStatus?: number
  ) {
    super(message);
    this.name = "FoxessApiError";
  }
}

/** Timeout, DNS/Socket-Fehler, HTTP-Fehler oder kaputte Antwort */
export class FoxessCommunicationError extends FoxessApiError {
  constructor(message: string, httpStatus?: number) {
    super(message, undefined, httpStatus);
    this.name = "FoxessCommunicationError";
  }
}

/** Ungültiger API-Key/Token oder fehlende Berechtigung */
export class FoxessAuthenticationError extends FoxessApiError {
  constructor(message: string, errno?: number, httpStatus?: number) {
    super(message, errno, httpStatus);
    this.name = "FoxessAuthenticationError";
  }
}
