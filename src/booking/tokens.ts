// Injection tokens for repository interfaces
export const EATER_REPOSITORY = Symbol('EaterRepository');
export const RESTAURANT_REPOSITORY = Symbol('RestaurantRepository');
export const ENDORSEMENT_REPOSITORY = Symbol('EndorsementRepository');
export const OPERATING_HOURS_REPOSITORY = Symbol('OperatingHoursRepository');
export const TABLE_REPOSITORY = Symbol('TableRepository');
export const RESERVATION_REPOSITORY = Symbol('ReservationRepository');
