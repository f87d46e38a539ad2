import { z } from 'zod';
import { HttpError, serviceRequest } from '@admissions/http-client';
import type { ServiceRequestOptions } from '@admissions/http-client';
import { createLogger } from '@admissions/observability';
import type { CrmFields } from './crm-fields';
import type { TokenSet, TokenStore } from './token-store';
import type { ContactProfile, CrmClient, LeadDetails, LeadFields } from './types';

const log = createLogger('kommo');

const REFRESH_MARGIN_MS = 5 * 60 * 1000;

export interface KommoOptions {
  /** Account root, e.g. https://school.amocrm.ru */
  accountUrl: string;
  accessToken: string;
  refreshToken: string;
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  pipelineId: number | null;
  statusId: number | null;
  fields: CrmFields;
  tokenStore: TokenStore;
  clock?: () => number;
}

type FieldValue = { value: string; enum_code?: string } | { enum_id: number };
type CustomField = { field_id: number; values: FieldValue[] } | { field_code: string; values: FieldValue[] };

const EntityIds = z.array(z.object({ id: z.number() })).min(1);
const ContactsSchema = z.object({ _embedded: z.object({ contacts: EntityIds }) });
const LeadsSchema = z.object({ _embedded: z.object({ leads: EntityIds }) });
const ContactSearchSchema = ContactsSchema.nullable();

const TokenResponseSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  expires_in: z.number(),
});

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function text(fieldId: number, value: string): CustomField {
  return { field_id: fieldId, values: [{ value }] };
}

function enumValue(fieldId: number, enumId: number): CustomField {
  return { field_id: fieldId, values: [{ enum_id: enumId }] };
}

/** Lead custom fields for whatever part of the lead is known */
export function leadCustomFields(fields: CrmFields, lead: LeadFields): CustomField[] {
  const ids = fields.lead;
  const values: CustomField[] = [];

  if (lead.childrenCount !== undefined && lead.childrenCount !== null) {
    values.push(text(ids.childrenCount, String(lead.childrenCount)));
  }
  if (lead.childrenAges && lead.childrenAges.length > 0) {
    values.push(text(ids.childrenAges, lead.childrenAges.join(', ')));
  }
  if (lead.program) {
    values.push(enumValue(ids.program, fields.enums.program[lead.program]));
  }
  if (lead.enrollment) {
    values.push(enumValue(ids.enrollment, fields.enums.enrollment[lead.enrollment]));
    values.push(text(ids.enrollmentText, fields.enrollmentText[lead.enrollment]));
  }
  if (lead.tourCampus) {
    const campusId = fields.enums.campus[lead.tourCampus];
    if (campusId !== undefined) values.push(enumValue(ids.tourCampus, campusId));
  }
  if (lead.tourDate) {
    values.push(text(ids.tourDateTime, [lead.tourDate, lead.tourTime].filter(Boolean).join(' ')));
  }
  if (lead.tourStatus) {
    values.push(text(ids.tourStatus, lead.tourStatus));
  }
  return values;
}

export function contactCustomFields(fields: CrmFields, phone: string, profile: ContactProfile): CustomField[] {
  const ids = fields.contact;
  const values: CustomField[] = [
    { field_code: 'PHONE', values: [{ value: phone, enum_code: 'WORK' }] },
    text(ids.contactPhone, phone),
    text(ids.telegramId, profile.chatId),
    text(ids.language, profile.language),
  ];
  if (profile.username) values.push(text(ids.telegramUsername, profile.username));
  return values;
}

/**
 * amoCRM (Kommo) v4 REST client. Every public call is best-effort:
 * failures are logged and come back as `null`/`false`.
 */
export class KommoClient implements CrmClient {
  private tokens: TokenSet;
  private refreshing: Promise<boolean> | null = null;
  private readonly apiUrl: string;
  private readonly clock: () => number;

  constructor(private readonly options: KommoOptions) {
    this.apiUrl = `${options.accountUrl.replace(/\/+$/, '')}/api/v4`;
    this.clock = options.clock ?? Date.now;
    this.tokens = options.tokenStore.load() ?? {
      accessToken: options.accessToken,
      refreshToken: options.refreshToken,
      expiresAt: null,
    };
  }

  async upsertContact(phone: string, profile: ContactProfile): Promise<number | null> {
    try {
      const found = await this.request('GET', '/contacts', ContactSearchSchema, { query: { query: phone } });
      const existingId = found?._embedded.contacts[0]?.id ?? null;

      const contact = {
        ...(profile.name ? { name: profile.name } : {}),
        custom_fields_values: contactCustomFields(this.options.fields, phone, profile),
      };

      if (existingId !== null) {
        await this.request('PATCH', `/contacts/${existingId}`, z.unknown(), { body: contact });
        return existingId;
      }
      const created = await this.request('POST', '/contacts', ContactsSchema, { body: [contact] });
      return created._embedded.contacts[0].id;
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Contact upsert failed');
      return null;
    }
  }

  async createLead(contactId: number | null, phone: string, lead: LeadDetails): Promise<number | null> {
    const { pipelineId, statusId, fields } = this.options;
    const body = {
      name: lead.name ? `${lead.name} - ${phone}` : `Telegram Lead - ${phone}`,
      custom_fields_values: leadCustomFields(fields, lead),
      ...(contactId !== null ? { _embedded: { contacts: [{ id: contactId }] } } : {}),
      ...(pipelineId !== null ? { pipeline_id: pipelineId } : {}),
      ...(statusId !== null ? { status_id: statusId } : {}),
    };

    try {
      const created = await this.request('POST', '/leads', LeadsSchema, { body: [body] });
      const leadId = created._embedded.leads[0].id;
      log.info({ leadId, contactId }, 'Lead created');
      return leadId;
    } catch (error) {
      log.error({ contactId, error: errorMessage(error) }, 'Lead creation failed');
      return null;
    }
  }

  async updateLead(leadId: number, fields: LeadFields): Promise<boolean> {
    const values = leadCustomFields(this.options.fields, fields);
    if (values.length === 0) return true;
    return this.attempt('Lead update failed', { leadId }, () =>
      this.request('PATCH', `/leads/${leadId}`, z.unknown(), { body: { custom_fields_values: values } }),
    );
  }

  async addNote(leadId: number, noteText: string): Promise<boolean> {
    return this.attempt('Note not added', { leadId }, () =>
      this.request('POST', `/leads/${leadId}/notes`, z.unknown(), {
        body: [{ entity_id: leadId, note_type: 'common', params: { text: noteText } }],
      }),
    );
  }

  async createTask(leadId: number, taskText: string, dueAt: Date): Promise<boolean> {
    return this.attempt('Task not created', { leadId }, () =>
      this.request('POST', '/tasks', z.unknown(), {
        body: [
          {
            text: taskText,
            complete_till: Math.floor(dueAt.getTime() / 1000),
            entity_id: leadId,
            entity_type: 'leads',
          },
        ],
      }),
    );
  }

  private async attempt(message: string, context: Record<string, unknown>, call: () => Promise<unknown>): Promise<boolean> {
    try {
      await call();
      return true;
    } catch (error) {
      log.error({ ...context, error: errorMessage(error) }, message);
      return false;
    }
  }

  private async request<S extends z.ZodTypeAny>(
    method: NonNullable<ServiceRequestOptions['method']>,
    path: string,
    schema: S,
    options: Pick<ServiceRequestOptions, 'body' | 'query'> = {},
  ): Promise<z.infer<S>> {
    const expiresAt = this.tokens.expiresAt;
    if (expiresAt !== null && this.clock() >= expiresAt - REFRESH_MARGIN_MS) {
      log.info('Access token expiring soon, refreshing');
      await this.refresh();
    }

    const send = () =>
      serviceRequest(this.apiUrl, path, schema, {
        ...options,
        method,
        headers: { Authorization: `Bearer ${this.tokens.accessToken}` },
      });

    try {
      return await send();
    } catch (error) {
      if (error instanceof HttpError && error.status === 401) {
        log.warn({ path }, 'Got 401, refreshing access token');
        if (await this.refresh()) return send();
      }
      throw error;
    }
  }

  /** Exchanges the refresh token; concurrent callers share one exchange */
  private refresh(): Promise<boolean> {
    if (!this.refreshing) {
      this.refreshing = this.exchangeRefreshToken().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  private async exchangeRefreshToken(): Promise<boolean> {
    const { accountUrl, clientId, clientSecret, redirectUri, tokenStore } = this.options;
    try {
      const response = await serviceRequest(accountUrl, '/oauth2/access_token', TokenResponseSchema, {
        method: 'POST',
        body: {
          client_id: clientId,
          client_secret: clientSecret,
          grant_type: 'refresh_token',
          refresh_token: this.tokens.refreshToken,
          redirect_uri: redirectUri,
        },
      });
      this.tokens = {
        accessToken: response.access_token,
        refreshToken: response.refresh_token,
        expiresAt: this.clock() + response.expires_in * 1000,
      };
    } catch (error) {
      log.error({ error: errorMessage(error) }, 'Access token refresh failed');
      return false;
    }

    try {
      tokenStore.save(this.tokens);
    } catch (error) {
      log.warn({ error: errorMessage(error) }, 'Refreshed tokens not cached');
    }
    log.info('Access token refreshed');
    return true;
  }
}
