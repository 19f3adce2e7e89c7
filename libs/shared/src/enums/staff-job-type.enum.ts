export enum StaffJobType {
  PAINT_WORKER = 'Paint Worker',
  WELDER = 'Welder',
  AUTO_REPAIR_WORKER = 'Auto Repair Worker',
  AUTO_ELECTRICIAN = 'Auto Electrician',
  SHEET_METAL_WORKER = 'Sheet Metal Worker',
  DIAGNOSTIC_TECHNICIAN = 'Diagnostic Technician',
  SERVICE_ADVISOR = 'Service Advisor',
  PARTS_SPECIALIST = 'Parts Specialist'
}

export enum UserRole {
  CUSTOMER = 'customer',
  STAFF = 'staff',
  ADMIN = 'admin'
}
