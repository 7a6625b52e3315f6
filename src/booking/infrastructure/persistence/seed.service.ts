import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, DataSource } from 'typeorm';
import { z } from 'zod';
import { Restaurant } from '../../domain/entities/restaurant.entity';
import { OperatingHours } from '../../domain/entities/operating-hours.entity';
import { Table } from '../../domain/entities/table.entity';
import { Eater } from '../../domain/entities/eater.entity';
import { DietaryRestriction } from '../../domain/entities/dietary-restriction.entity';
import { Endorsement } from '../../domain/entities/endorsement.entity';
import { EaterRestriction } from '../../domain/entities/eater-restriction.entity';
import { RestaurantEndorsement } from '../../domain/entities/restaurant-endorsement.entity';
import { RestrictionEndorsement } from '../../domain/entities/restriction-endorsement.entity';
import { LoggerService } from '../logging/logger.service';
import seedData from './seed-data.json';

const NamedSchema = z.object({ id: z.string(), name: z.string() });
const ClockTimeSchema = z.string().regex(/^\d{2}:\d{2}$/);

const SeedDataSchema = z.object({
  dietaryRestrictions: z.array(NamedSchema),
  endorsements: z.array(NamedSchema),
  coverage: z.array(
    z.object({ restrictionId: z.string(), endorsementId: z.string() }),
  ),
  eaters: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      email: z.string().email(),
      restrictionIds: z.array(z.string()),
    }),
  ),
  restaurants: z.array(
    z.object({
      id: z.string(),
      name: z.string(),
      averageRating: z.number().nullable(),
      address: z.string().nullable(),
      phone: z.string().nullable(),
      email: z.string().nullable(),
      websiteUrl: z.string().nullable(),
      hasParking: z.boolean(),
      acceptsReservations: z.boolean(),
      hours: z.object({ opening: ClockTimeSchema, closing: ClockTimeSchema }),
      tableCapacities: z.array(z.number().int().positive()),
      endorsementIds: z.array(z.string()),
    }),
  ),
});

export type SeedData = z.infer<typeof SeedDataSchema>;

@Injectable()
export class SeedService {
  constructor(
    @InjectRepository(Restaurant)
    private readonly restaurantRepository: Repository<Restaurant>,
    private readonly dataSource: DataSource,
    private readonly logger: LoggerService,
  ) {}

  async seed(data: unknown = seedData): Promise<void> {
    const existingRestaurant = await this.restaurantRepository.findOne({
      where: { id: 'R1' },
    });

    if (existingRestaurant) {
      this.logger.debug('Seed data already present, skipping');
      return;
    }

    const parsed = SeedDataSchema.parse(data);

    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const { manager } = queryRunner;

      await manager.save(DietaryRestriction, parsed.dietaryRestrictions);
      await manager.save(Endorsement, parsed.endorsements);
      await manager.save(RestrictionEndorsement, parsed.coverage);

      for (const { restrictionIds, ...eater } of parsed.eaters) {
        await manager.save(Eater, eater);
        await manager.save(
          EaterRestriction,
          restrictionIds.map((restrictionId) => ({
            eaterId: eater.id,
            restrictionId,
          })),
        );
      }

      for (const {
        hours,
        tableCapacities,
        endorsementIds,
        ...restaurant
      } of parsed.restaurants) {
        await manager.save(Restaurant, restaurant);
        await manager.save(OperatingHours, {
          id: `OH-${restaurant.id}`,
          restaurantId: restaurant.id,
          openingTime: hours.opening,
          closingTime: hours.closing,
        });
        await manager.save(
          Table,
          tableCapacities.map((capacity, index) => ({
            id: `${restaurant.id}-T${index + 1}`,
            restaurantId: restaurant.id,
            capacity,
          })),
        );
        await manager.save(
          RestaurantEndorsement,
          endorsementIds.map((endorsementId) => ({
            restaurantId: restaurant.id,
            endorsementId,
          })),
        );
      }

      await queryRunner.commitTransaction();
      this.logger.log({
        op: 'seed',
        outcome: 'success',
        restaurants: parsed.restaurants.length,
        eaters: parsed.eaters.length,
      });
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }
}
