/**
 * Lichess Study Client - Imports PGN chapters into a study
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { LICHESS_API } from '../config/constants.js';
import { PublishError, errorMessage } from '../utils/errors.js';

const MAX_ERROR_BODY = 2000;

export interface LichessStudyClientOptions {
  token: string;
  baseURL?: string;
  timeout?: number;
  http?: AxiosInstance;
}

export class LichessStudyClient {
  readonly http: AxiosInstance;

  constructor(options: LichessStudyClientOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseURL ?? LICHESS_API.BASE_URL,
        timeout: options.timeout ?? LICHESS_API.TIMEOUT,
        headers: {
          Authorization: `Bearer ${options.token}`,
          Accept: 'application/json',
        },
        // Status codes are checked below so the body can go into the error
        validateStatus: () => true,
      });
  }

  /**
   * Add one chapter to the study. Returns the response body.
   */
  async importChapter(studyId: string, name: string, pgn: string): Promise<string> {
    const form = new URLSearchParams({ name, pgn });

    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.post(`/api/study/${encodeURIComponent(studyId)}/import-pgn`, form, {
        responseType: 'text',
      });
    } catch (error) {
      throw new PublishError(`Chapter upload failed: ${errorMessage(error)}`, null, { cause: error });
    }

    const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data);
    if (response.status >= 400) {
      throw new PublishError(
        `${response.status} ${response.statusText}\n${body.slice(0, MAX_ERROR_BODY)}`,
        response.status
      );
    }

    return body;
  }
}
