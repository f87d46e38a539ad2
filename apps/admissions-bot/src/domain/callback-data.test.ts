import { describe, expect, it } from 'vitest';
import { callbackData, decodeCallbackData, decodeStaffStatus } from './callback-data';

describe('decodeCallbackData', () => {
  it('decodes every funnel token', () => {
    expect(decodeCallbackData('lang_uz')).toEqual({ type: 'language', locale: 'uz' });
    expect(decodeCallbackData('children_4')).toEqual({ type: 'children_count', count: 4 });
    expect(decodeCallbackData('age_11-14')).toEqual({ type: 'child_age', age: '11-14' });
    expect(decodeCallbackData('program_ib')).toEqual({ type: 'program', program: 'ib' });
    expect(decodeCallbackData('enroll_next_year')).toEqual({ type: 'enrollment', enrollment: 'next_year' });
    expect(decodeCallbackData('campus_mu')).toEqual({ type: 'campus', campus: 'mu' });
    expect(decodeCallbackData('date_2026-10-19')).toEqual({ type: 'tour_date', date: '2026-10-19' });
    expect(decodeCallbackData('date_next_week')).toEqual({ type: 'tour_dates_next_week' });
    expect(decodeCallbackData('time_14:00')).toEqual({ type: 'tour_time', time: '14:00' });
    expect(decodeCallbackData('menu_contact_manager')).toEqual({ type: 'menu_action', action: 'contact_manager' });
    expect(decodeCallbackData('reminder_cancel')).toEqual({ type: 'reminder_response', action: 'cancel' });
  });

  it('rejects unknown or out-of-range values', () => {
    expect(decodeCallbackData('lang_de')).toBeNull();
    expect(decodeCallbackData('children_0')).toBeNull();
    expect(decodeCallbackData('children_5')).toBeNull();
    expect(decodeCallbackData('age_1-2')).toBeNull();
    expect(decodeCallbackData('date_tomorrow')).toBeNull();
    expect(decodeCallbackData('admin_status_3_attended')).toBeNull();
    expect(decodeCallbackData('something')).toBeNull();
  });

  it('reads back what the encoders write', () => {
    expect(decodeCallbackData(callbackData.tourTime('10:00'))).toEqual({ type: 'tour_time', time: '10:00' });
    expect(decodeCallbackData(callbackData.menu('book_tour'))).toEqual({ type: 'menu_action', action: 'book_tour' });
  });
});

describe('decodeStaffStatus', () => {
  it('maps the short no-show token', () => {
    expect(decodeStaffStatus('admin_status_17_noshow')).toEqual({ type: 'staff_status', tourId: 17, status: 'no_show' });
    expect(callbackData.staffStatus(17, 'no_show')).toBe('admin_status_17_noshow');
  });

  it('decodes attended and rescheduled', () => {
    expect(decodeStaffStatus('admin_status_17_attended')).toEqual({ type: 'staff_status', tourId: 17, status: 'attended' });
    expect(decodeStaffStatus('admin_status_2_rescheduled')).toEqual({ type: 'staff_status', tourId: 2, status: 'rescheduled' });
  });

  it('rejects other statuses', () => {
    expect(decodeStaffStatus('admin_status_17_confirmed')).toBeNull();
    expect(decodeStaffStatus('admin_status_x_attended')).toBeNull();
  });
});
