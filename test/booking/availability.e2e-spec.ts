import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { AppModule } from '../../src/app.module';
import { SeedService } from '../../src/booking/infrastructure/persistence/seed.service';

describe('Availability API (e2e)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication();

    // Set global prefix to match production
    app.setGlobalPrefix('api', {
      exclude: ['/'],
    });

    await app.init();
    await moduleFixture.get<SeedService>(SeedService).seed();
  });

  afterAll(async () => {
    await app.close();
  });

  const search = (query: string) =>
    request(app.getHttpServer()).get(`/api/restaurants/available?${query}`);

  const ids = (body: { restaurants: Array<{ id: string }> }) =>
    body.restaurants.map((restaurant) => restaurant.id);

  describe('GET /api/restaurants/available', () => {
    it('should return restaurants covering a gluten free eater', async () => {
      const response = await search('time=18:00&date=2030-05-01&eaterIds=E1');

      expect(response.status).toBe(200);
      expect(response.body.count).toBe(5);
      expect(ids(response.body)).toEqual(['R1', 'R2', 'R3', 'R4', 'R5']);
    });

    it('should exclude restaurants lacking the vegan endorsement', async () => {
      const response = await search('time=18:00&date=2030-05-01&eaterIds=E3');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        count: 1,
        restaurants: [
          {
            id: 'R7',
            name: 'Leaf & Lantern',
            averageRating: 4.8,
            address: '5 Garden Row',
            phone: '555-0107',
            hours: { opening: '00:00', closing: '23:59' },
            endorsements: [
              { id: 'EN2', name: 'Vegetarian-Friendly' },
              { id: 'EN3', name: 'Vegan-Friendly' },
            ],
            hasParking: false,
            acceptsReservations: true,
          },
        ],
      });
    });

    it('should accept comma separated eater ids', async () => {
      const response = await search(
        'time=18:00&date=2030-05-01&eaterIds=E1,E2',
      );

      expect(response.status).toBe(200);
      expect(ids(response.body)).toEqual(['R1', 'R4']);
    });

    it('should accept repeated eater ids', async () => {
      const response = await search(
        'time=18:00&date=2030-05-01&eaterIds=E1&eaterIds=E2',
      );

      expect(response.status).toBe(200);
      expect(ids(response.body)).toEqual(['R1', 'R4']);
    });

    it('should only return restaurants with a table for the whole party', async () => {
      const response = await search(
        'time=18:00&date=2030-05-01&eaterIds=E4&additionalGuests=5',
      );

      expect(response.status).toBe(200);
      expect(ids(response.body)).toEqual(['R2', 'R3', 'R5', 'R6']);
    });

    it('should leave out restaurants that are closed at the start time', async () => {
      const response = await search('time=21:00&date=2030-05-01&eaterIds=E1');

      expect(response.status).toBe(200);
      expect(ids(response.body)).toEqual(['R2', 'R3', 'R4', 'R5']);
    });

    it('should leave out restaurants whose fitting tables are booked', async () => {
      for (const hostId of ['E1', 'E2']) {
        const booked = await request(app.getHttpServer())
          .post('/api/reservations')
          .send({
            hostId,
            restaurantId: 'R7',
            date: '2030-06-01',
            time: '18:00',
          });
        expect(booked.status).toBe(201);
      }

      const response = await search('time=19:00&date=2030-06-01&eaterIds=E3');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ count: 0, restaurants: [] });
    });

    it('should return nothing for a window running past midnight', async () => {
      const response = await search('time=23:00&date=2030-05-01&eaterIds=E4');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ count: 0, restaurants: [] });
    });

    it('should return 404 for an unknown eater', async () => {
      const response = await search(
        'time=18:00&date=2030-05-01&eaterIds=E1,E99',
      );

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        error: 'eater_not_found',
        detail: 'One or more eaters not found',
      });
    });

    it('should return 400 for a malformed time', async () => {
      const response = await search('time=abc&date=2030-05-01&eaterIds=E1');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        error: 'invalid_time_format',
        detail: 'Invalid time format: abc. Use HH:MM format.',
      });
    });

    it('should return 400 when no eater is given', async () => {
      const response = await search('time=18:00&date=2030-05-01');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('invalid_input');
    });
  });
});
