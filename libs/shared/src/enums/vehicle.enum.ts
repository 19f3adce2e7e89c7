export enum VehicleBrand {
  TOYOTA = 'Toyota',
  HONDA = 'Honda',
  FORD = 'Ford',
  CHEVROLET = 'Chevrolet',
  NISSAN = 'Nissan',
  BMW = 'BMW',
  MERCEDES = 'Mercedes-Benz',
  AUDI = 'Audi',
  VOLKSWAGEN = 'Volkswagen',
  HYUNDAI = 'Hyundai',
  KIA = 'Kia'
}

export enum VehicleType {
  SEDAN = 'Sedan',
  SUV = 'SUV',
  TRUCK = 'Truck',
  VAN = 'Van',
  COUPE = 'Coupe',
  HATCHBACK = 'Hatchback',
  CONVERTIBLE = 'Convertible',
  WAGON = 'Wagon',
  MOTORCYCLE = 'Motorcycle',
  BUS = 'Bus'
}

export enum VehicleColor {
  RED = 'Red',
  BLUE = 'Blue',
  GREEN = 'Green',
  BLACK = 'Black',
  WHITE = 'White',
  SILVER = 'Silver',
  YELLOW = 'Yellow',
  ORANGE = 'Orange',
  PURPLE = 'Purple',
  PINK = 'Pink',
  GREY = 'Grey'
}
