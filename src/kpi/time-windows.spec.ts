import { dayWindow, hourWindow } from './time-windows';

describe('time windows', () => {
  it('should floor to the UTC hour', () => {
    expect(hourWindow(new Date('2024-06-15T10:59:59.999Z'))).toEqual({
      start: new Date('2024-06-15T10:00:00.000Z'),
      end: new Date('2024-06-15T11:00:00.000Z'),
    });
  });

  it('should keep an exact hour boundary in its own window', () => {
    expect(hourWindow(new Date('2024-06-15T11:00:00.000Z')).start).toEqual(
      new Date('2024-06-15T11:00:00.000Z'),
    );
  });

  it('should cover the UTC day', () => {
    expect(dayWindow(new Date('2024-06-15T23:30:00.000Z'))).toEqual({
      start: new Date('2024-06-15T00:00:00.000Z'),
      end: new Date('2024-06-16T00:00:00.000Z'),
      date: '2024-06-15',
    });
  });
});
