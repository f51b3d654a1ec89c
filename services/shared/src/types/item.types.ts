export interface ItemDto {
     id: string;
     sku: string;
     name: string;
     description: string;
     price: number;
     currency: string;
     availableStock: number;
     reservedStock: number;
     totalStock: number;
     category: string;
     isActive: boolean;
     createdAt: Date;
     updatedAt: Date;
     concurrencyToken: string;
}
